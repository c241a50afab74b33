import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

const PACKAGE_NAME = 'pystylelint';

/*
 * Walks up from this module to the project's package.json. The module sits at
 * a different depth in src/ and in the bundled dist/, so no fixed relative path works.
 */
function findPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) {
      const raw: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      const parsed = PACKAGE_JSON_SCHEMA.safeParse(raw);
      if (parsed.success && parsed.data.name === PACKAGE_NAME) {
        return parsed.data.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

export const VERSION = findPackageVersion();
