import { z } from "zod";

import type { TintforgeConfig } from "../../types/config";
import { DEFAULT_FILTER_OPTIONS } from "../../types/palette";

const positiveInteger = z.number().int().positive();

const configSchema = z
  .object({
    theme: z
      .object({
        variant: z.enum(["dark", "light"]).optional(),
        intensity: z.number().int().min(0).max(100).optional(),
        dominantBackground: z.boolean().optional(),
      })
      .strict()
      .optional(),
    filter: z
      .object({
        targetCount: positiveInteger.optional(),
        maxIterations: positiveInteger.optional(),
        minimumCount: positiveInteger.optional(),
        backgroundThreshold: z.enum(["quartic", "linear"]).optional(),
      })
      .strict()
      .optional(),
    extract: z
      .object({
        colorCount: positiveInteger.optional(),
        quality: positiveInteger.optional(),
        maxDimension: positiveInteger.optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        formats: z.array(z.string().trim().min(1)).min(1).optional(),
        vimDir: z.string().trim().min(1).optional(),
        shellDir: z.string().trim().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const describeIssue = (issue: z.ZodIssue): string => {
  const keyPath = issue.path.join(".");
  return keyPath ? `${keyPath}: ${issue.message}` : issue.message;
};

export const validateConfig = (value: unknown): TintforgeConfig => {
  const parsed = configSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid config: ${parsed.error.issues.map(describeIssue).join("; ")}`);
  }

  const config = parsed.data;
  const minimumCount = config.filter?.minimumCount;
  const targetCount = config.filter?.targetCount;
  if (minimumCount !== undefined && minimumCount > (targetCount ?? DEFAULT_FILTER_OPTIONS.targetCount)) {
    throw new Error("filter.minimumCount must be <= filter.targetCount");
  }

  return config;
};
