import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONCURRENCY, DEFAULT_CONFIG_FILENAME } from '../config/constants';

function parseBracketList(value: string): string[] {
  const v = value.trim();
  const m = v.match(/^\[(.*)\]$/);
  if (!m || m[1] === undefined) return [];
  const inner = m[1];
  return inner
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => s.replace(/^"|"$/g, '').replace(/^'|'$/g, ''));
}

enum ConfigKey {
  CONCURRENCY = 'Concurrency',
  EXCLUDE = 'Exclude',
}

/**
 * Load and validate configuration from .pystylelint.ini.
 * The default file is optional; an explicit --config path must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${iniPath}`);
    }
    return CONFIG_SCHEMA.parse({ configDir: cwd });
  }

  const configDir = path.dirname(iniPath);

  let concurrencyRaw: number | undefined;
  let excludeRaw: string[] | undefined;

  try {
    const raw = readFileSync(iniPath, 'utf-8');

    for (const rawLine of raw.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) continue;

      const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
      if (!m || !m[1]) continue;

      const key = m[1];
      const val = m[2] || '';

      switch (key) {
        case ConfigKey.CONCURRENCY as string: {
          const parsed = parseInt(val, 10);
          if (Number.isNaN(parsed)) {
            throw new ConfigError(`Invalid Concurrency value: ${val}`);
          }
          concurrencyRaw = parsed;
          break;
        }
        case ConfigKey.EXCLUDE as string:
          if (!/^\[.*\]$/.test(val.trim())) {
            throw new ConfigError(`Exclude must be a bracket list like [build/**, .venv/**]: ${val}`);
          }
          excludeRaw = parseBracketList(val);
          break;
      }
    }
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const configData = {
    concurrency: concurrencyRaw ?? DEFAULT_CONCURRENCY,
    exclude: excludeRaw ?? [],
    configDir,
  };

  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid configuration: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
