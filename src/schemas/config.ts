import os from 'os';
import { z } from 'zod';

const BooleanFlagSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

const PositiveIntSchema = z.coerce.number().int().positive();

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const ScannerConfigSchema = z.object({
  targets: z.array(z.string().min(1)).default([]),
  ports: z.string().default('1-1024'),
  tcp: BooleanFlagSchema.default(true),
  udp: BooleanFlagSchema.default(false),
  timeoutMs: PositiveIntSchema.default(2000),
  serviceDetection: BooleanFlagSchema.default(false),
  serviceTimeoutMs: PositiveIntSchema.default(5000),
  concurrency: PositiveIntSchema.default(() => Math.max(os.cpus().length, 1)),
  probesFile: z.string().min(1).default('probes/service-probes'),
  jsonOutput: z.string().min(1).optional(),
  script: z.string().min(1).optional(),
  scriptsDir: z.string().min(1).default('scripts'),
  logLevel: LogLevelSchema.default('info'),
  portsExplicitlySpecified: z.boolean().default(false),
});

// Shape accepted from a JSON config file; unknown keys are dropped
export const ConfigFileSchema = ScannerConfigSchema.partial().omit({ portsExplicitlySpecified: true });

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type ScannerConfigInput = z.input<typeof ScannerConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
