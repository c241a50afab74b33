// Prefix matches: `MyClass_v2` passes CamelCase, `load_Data` passes snake_case.
const CAMEL_CASE = /^([A-Z]+[a-z]*)+/;
const SNAKE_CASE = /^[a-z_]+[0-9a-z_]*/;

export function isCamelCase(name: string): boolean {
  return CAMEL_CASE.test(name);
}

export function isSnakeCase(name: string): boolean {
  return SNAKE_CASE.test(name);
}
