import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  structure: z.object({
    defaultThreshold: z.number().gt(0).max(1).default(0.8),
    centerPointFallback: z.boolean().default(true),
    keepContainerText: z.boolean().default(false),
    rulesPath: z.string().min(1).optional(),
  }),
  tables: z.object({
    rowTolerancePx: z.number().positive().default(5),
    leftMarginPx: z.number().positive().default(200),
  }),
  output: z.object({
    directory: z.string().min(1).default('./output'),
  }),
});

export type Config = z.infer<typeof configSchema>;
