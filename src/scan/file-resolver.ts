import fg from 'fast-glob';
import micromatch from 'micromatch';
import path from 'path';
import * as fs from 'fs';
import { ALLOWED_EXTS } from '../config/constants';

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

function hasAllowedExt(filePath: string): boolean {
  return ALLOWED_EXTS.has(path.extname(filePath).toLowerCase());
}

/**
 * Expands CLI arguments into an absolute, deduplicated, sorted file list.
 * Files named explicitly are kept whatever their extension; directories and
 * globs only contribute `.py` files.
 */
export function resolveTargets(args: {
  cliArgs: string[];
  cwd: string;
  exclude: string[];
}): string[] {
  const { cliArgs, cwd, exclude } = args;

  const files: string[] = [];
  for (const arg of cliArgs) {
    const absArg = path.resolve(cwd, arg);
    if (fs.existsSync(absArg)) {
      const stat = fs.statSync(absArg);
      if (stat.isDirectory()) {
        const found = fg.sync('**/*.py', { cwd: absArg, absolute: true, dot: false, onlyFiles: true });
        files.push(...found);
      } else if (stat.isFile()) {
        files.push(absArg);
      }
    } else {
      // Try as glob
      const found = fg.sync(toPosix(arg), { cwd, absolute: true, dot: false, onlyFiles: true });
      files.push(...found.filter(hasAllowedExt));
    }
  }

  const dedup = new Set<string>();
  for (const f of files) {
    const abs = path.resolve(f);
    const rel = toPosix(path.relative(cwd, abs));
    if (exclude.length > 0 && micromatch.isMatch(rel, exclude)) continue;
    dedup.add(abs);
  }
  return Array.from(dedup).sort();
}
