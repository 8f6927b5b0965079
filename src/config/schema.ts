// ─── Conversion Config Schema ────────────────────────────────────────────────
//
// Options shared by the clean, compose and convert commands. The CLI builds a
// loose object from its flags; everything downstream gets the parsed,
// defaulted ConversionConfig.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ConfigurationRangeError, type ConfigIssue } from "../errors.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const hourSchema = z.number().int().min(0).max(23);

export const ConversionConfigSchema = z
  .object({
    skipLines: z.number().int().min(0).default(3),
    dayStart: hourSchema.default(6),
    dayEnd: hourSchema.default(20),
    sineRange: z.number().min(1).default(6),
    toleranceMinutes: z.number().min(0).default(30),
    useSolar: z.boolean().default(false),
    useRealisticTiming: z.boolean().default(true),
    bpm: z.number().min(60).max(240).default(120),
    durationSeconds: z.number().min(60).max(600).default(300),
    autoDuration: z.boolean().default(false),
    cloudColumn: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.dayStart >= config.dayEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dayStart"],
        message: `day-start (${config.dayStart}) must be less than day-end (${config.dayEnd})`,
      });
    }
  });

// ─── Derived Types ───────────────────────────────────────────────────────────

export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type ConversionConfigInput = z.input<typeof ConversionConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a config object. Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigIssue[] {
  const result = ConversionConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Parse and default a config, throwing ConfigurationRangeError on any issue.
 */
export function resolveConfig(input: unknown = {}): ConversionConfig {
  const result = ConversionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationRangeError(
      result.error.issues.map((issue) => ({
        field: issue.path.join(".") || "root",
        message: issue.message,
      })),
    );
  }
  return result.data;
}
