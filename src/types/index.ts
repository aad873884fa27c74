/**
 * Creative Orchestrator — Core Type Definitions
 *
 * Engine configuration, generation request shape and the functional
 * Result type shared by every module. Uses Zod for runtime validation
 * with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const CostModeSchema = z.enum(['balanced', 'cost_optimized', 'quality_optimized']);
export type CostMode = z.infer<typeof CostModeSchema>;

/** Longest delay a Node.js timer honours; larger values fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;

// ═══════════════════════════════════════════════════════════════════════════
// GENERATION REQUEST
// ═══════════════════════════════════════════════════════════════════════════

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const GenerationRequestSchema = z.object({
  prompt: z.string(),
  params: z.record(z.string(), JsonValueSchema).default({}),
  /** Provider the caller would like to try first, if the chain allows it */
  requestedProvider: z.string().min(1).optional(),
  costMode: CostModeSchema.optional(),
  /** Overrides the conservative pre-routing estimate (USD) */
  estimatedCostUsd: z.number().nonnegative().optional(),
  /** Total time budget for the whole orchestration */
  deadlineMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
  orchestration: z.object({
    default_deadline_ms: z.number().int().positive().max(MAX_TIMER_MS).default(300_000),
    validation_enabled: z.boolean().default(true),
  }),
  paths: z.object({
    base_dir: z.string().default('~/.creative-orchestrator'),
    config_file: z.string().default('config.json'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
