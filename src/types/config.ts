/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const BatchConfigSchema = z.object({
  // Directory prepended to PATH so commands can find the image tool
  toolPath: z.string().min(1).nullable(),
  failFast: z.boolean(),
});

export const UpdaterConfigSchema = z.object({
  listUrl: z.url(),
  // "{script}" is replaced with the URL-encoded script name
  downloadUrl: z
    .string()
    .min(1)
    .refine((value) => value.includes("{script}"), {
      message: 'downloadUrl must contain the "{script}" placeholder',
    }),
  binDir: z.string().min(1),
  prefix: z.string(),
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  batch: BatchConfigSchema,
  updater: UpdaterConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  batch: BatchConfigSchema.partial().optional(),
  updater: UpdaterConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type UpdaterConfig = z.infer<typeof UpdaterConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigLoadError {
  path: string;
  error: unknown;
}
