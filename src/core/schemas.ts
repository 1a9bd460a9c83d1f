// Zod schemas for configuration and runtime module validation

import { z } from 'zod';
import type { ProbeRuntime, ProbeRuntimeModule } from '../services/probe/probe-runtime.js';

/**
 * Log level names accepted in config and PREFLIGHT_LOG_LEVEL
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * `X`, `X.Y` or `X.Y.Z`, optional leading `v`
 */
export const VersionStringSchema = z
  .string()
  .regex(/^v?\d+(\.\d+){0,2}$/, 'Expected a version like 20.0 or 20.0.0');

/**
 * .preflight/config.yaml
 */
export const PreflightConfigSchema = z
  .object({
    runtime: z
      .object({
        module: z.string().min(1, 'Runtime module is required').optional(),
        minimumVersion: VersionStringSchema.optional()
      })
      .strict()
      .optional(),
    compile: z
      .object({
        extraCflags: z.array(z.string().min(1)).max(50, 'Too many compiler flags').optional()
      })
      .strict()
      .optional(),
    agent: z
      .object({
        launchCommand: z.string().min(1, 'Launch command is required').optional()
      })
      .strict()
      .optional(),
    log: z
      .object({
        level: LogLevelNameSchema.optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type PreflightConfig = z.infer<typeof PreflightConfigSchema>;

function hasFunction<K extends string>(value: unknown, key: K): value is Record<K, (...args: never[]) => unknown> {
  return typeof value === 'object' && value !== null && key in value && typeof Reflect.get(value, key) === 'function';
}

/**
 * Module namespace of a third-party probe runtime
 */
export const ProbeRuntimeModuleSchema = z.custom<ProbeRuntimeModule>(
  value => hasFunction(value, 'createProbeRuntime'),
  'Module must export a createProbeRuntime() function'
);

/**
 * What createProbeRuntime() must return
 */
export const ProbeRuntimeSchema = z.custom<ProbeRuntime>(
  value => hasFunction(value, 'load') && typeof Reflect.get(value, 'description') === 'string',
  'Runtime must have a "description" string and a load() function'
);

/**
 * Format zod issues as "path: message" lines joined with "; "
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
