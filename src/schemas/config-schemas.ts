import { z } from 'zod';
import { DEFAULT_CONCURRENCY } from '../config/constants';

// Configuration file schema for .pystylelint.ini validation
export const CONFIG_SCHEMA = z.object({
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  exclude: z.array(z.string().min(1)).default([]),
  configDir: z.string().min(1),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
