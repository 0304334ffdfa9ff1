// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Schemas for Runtime and Module Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { DEFAULT_FOLDER_PATHS, DEFAULT_RUNTIME_FLAGS } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Dot-separated module path, e.g. `Data.ProfileLoader`.
 */
export const ModuleNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, 'Module name must be a dot-separated path');

export const ModuleLocationSchema = z.enum(['server', 'client', 'shared']);

export const RuntimeSideSchema = z.enum(['server', 'client']);

export const BackoffStrategySchema = z.enum(['exponential', 'fixed']);

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Partial retry options; unset fields fall through to the next layer.
 */
export const RetryOptionsSchema = z
  .object({
    initialDelayMs: z.number().positive('initialDelayMs must be positive'),
    maxAttempts: z.number().int().min(1, 'maxAttempts must be at least 1'),
    warn: z.boolean(),
    jitter: z.boolean(),
    backoffStrategy: BackoffStrategySchema,
  })
  .partial()
  .strict();

export const RetryOverridesSchema = z
  .object({
    general: RetryOptionsSchema,
    background: RetryOptionsSchema,
    load: RetryOptionsSchema,
    init: RetryOptionsSchema,
    start: RetryOptionsSchema,
    stop: RetryOptionsSchema,
    runtime: RetryOptionsSchema,
  })
  .partial()
  .strict();

// ─────────────────────────────────────────────────────────────────────────────────
// MODULE DESCRIPTOR
// ─────────────────────────────────────────────────────────────────────────────────

export const ModuleDescriptorSchema = z
  .object({
    location: ModuleLocationSchema,
    dependencies: z.array(ModuleNameSchema).default([]),
    critical: z.boolean().default(false),
    retry: RetryOverridesSchema.default({}),
  })
  .strict();

// ─────────────────────────────────────────────────────────────────────────────────
// RUNTIME CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const FolderPathsSchema = z.object({
  server: z.string().min(1).default(DEFAULT_FOLDER_PATHS.server),
  client: z.string().min(1).default(DEFAULT_FOLDER_PATHS.client),
  shared: z.array(z.string().min(1)).default(DEFAULT_FOLDER_PATHS.shared),
});

export const RuntimeConfigSchema = z
  .object({
    side: RuntimeSideSchema.default('server'),
    modules: z.record(ModuleNameSchema, ModuleDescriptorSchema).default({}),
    retry: RetryOverridesSchema.default({}),
    strictValidation: z.boolean().default(DEFAULT_RUNTIME_FLAGS.strictValidation),
    useRecoveryQueue: z.boolean().default(DEFAULT_RUNTIME_FLAGS.useRecoveryQueue),
    criticalBackgroundRetries: z.boolean().default(DEFAULT_RUNTIME_FLAGS.criticalBackgroundRetries),
    allowDuplicates: z.boolean().default(DEFAULT_RUNTIME_FLAGS.allowDuplicates),
    folderPaths: FolderPathsSchema.default({}),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
export type ModuleDescriptorInput = z.input<typeof ModuleDescriptorSchema>;
export type FolderPaths = z.infer<typeof FolderPathsSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate config, throwing the zod error on failure.
 */
export function validateRuntimeConfig(input: unknown): RuntimeConfig {
  return RuntimeConfigSchema.parse(input);
}

/**
 * Validate config without throwing.
 */
export function safeValidateRuntimeConfig(input: unknown) {
  return RuntimeConfigSchema.safeParse(input);
}
