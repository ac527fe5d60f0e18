/**
 * Option schemas and defaults
 */

import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";

/** Exponent applied to the growing per-pass error threshold */
export const DEFAULT_AGGRESSIVENESS = 7;

/** Pass budget of one decimation run */
export const DEFAULT_MAX_PASSES = 100;

/** Adjacency is rebuilt every this many passes (pass 0 included) */
export const DEFAULT_REFRESH_INTERVAL = 5;

/**
 * Decimation options schema.
 * Exactly one of `targetTriangleCount` and `ratio` must be set.
 */
export const decimationOptionsSchema = z
  .object({
    /** Stop once the live triangle count drops to this value */
    targetTriangleCount: z.number().int().nonnegative().optional(),
    /** Target as a fraction of the input triangle count (0-1) */
    ratio: z.number().min(0).max(1).optional(),
    aggressiveness: z
      .number()
      .positive()
      .finite()
      .default(DEFAULT_AGGRESSIVENESS),
    maxPasses: z.number().int().positive().default(DEFAULT_MAX_PASSES),
    refreshInterval: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_REFRESH_INTERVAL),
  })
  .refine(
    (options) =>
      (options.targetTriangleCount === undefined) !==
      (options.ratio === undefined),
    {
      message: "exactly one of targetTriangleCount and ratio is required",
      path: ["targetTriangleCount"],
    },
  );

export type DecimationOptions = z.input<typeof decimationOptionsSchema>;
export type ResolvedDecimationOptions = z.output<typeof decimationOptionsSchema>;

export const splitOptionsSchema = z.object({
  iterations: z.number().int().min(0),
});

export type SplitOptions = z.input<typeof splitOptionsSchema>;

/**
 * Configuration for a single LOD level
 */
export const lodLevelSchema = z.object({
  /** LOD level name (e.g., "lod1", "lod2") */
  name: z.string().min(1),
  /** Fraction of the source triangle count to keep (0-1) */
  ratio: z.number().min(0).max(1),
  /** Minimum triangles to keep */
  minTriangles: z.number().int().nonnegative().optional(),
  aggressiveness: z.number().positive().finite().optional(),
});

export type LODLevelConfig = z.input<typeof lodLevelSchema>;

/**
 * Parse a value against a schema, raising InvalidOptionsError on failure
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return result.data;
}
