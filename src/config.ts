// =============================================================================
// Extraction Config — Defaults & environment variable loading
// =============================================================================

import { z } from "zod";
import { ValidationError } from "./errors.js";

export const ExtractionConfigSchema = z.object({
  /** "parallel" starts every capability at once but still commits in list order */
  concurrency: z.enum(["sequential", "parallel"]).default("sequential"),
  /** Per-capability timeout; a timed-out capability counts as failed */
  timeoutMs: z.coerce.number().int().positive().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;

// Environment variable mapping
export const ENV_MAP = {
  concurrency: "EXTRACTION_CONCURRENCY",
  timeoutMs: "EXTRACTION_TIMEOUT_MS",
  logLevel: "EXTRACTION_LOG_LEVEL",
} as const satisfies Record<keyof ExtractionConfig, string>;

function validateConfig(input: unknown): ExtractionConfig {
  const parsed = ExtractionConfigSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ValidationError(issue.message, issue.path.join("."));
  }
  return parsed.data;
}

export function parseExtractionConfig(input: ExtractionConfigInput = {}): ExtractionConfig {
  return validateConfig(input);
}

/** Read the config from environment variables; unset or empty variables take the defaults. */
export function loadExtractionConfig(env: Record<string, string | undefined> = process.env): ExtractionConfig {
  const input: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_MAP)) {
    const value = env[variable]?.trim();
    if (value) input[field] = value;
  }
  return validateConfig(input);
}
