/**
 * Quadric Mesh Decimation
 *
 * Main entry point for the decimation library.
 * Reduces the triangle count of an indexed mesh by iterative edge collapse
 * driven by quadric error metrics, and provides uniform triangle
 * subdivision over the same mesh model.
 *
 * Based on "Surface Simplification Using Quadric Error Metrics"
 * (Garland & Heckbert, SIGGRAPH 1997)
 *
 * @module @meshkit/decimation
 */

import type { DecimationResult, Vec3 } from "./types.js";
import {
  decimationOptionsSchema,
  lodLevelSchema,
  parseOptions,
  splitOptionsSchema,
  type DecimationOptions,
  type LODLevelConfig,
} from "./config.js";
import { InvalidMeshError } from "./errors.js";
import { MeshModel } from "./mesh/mesh-model.js";
import { decimateMesh } from "./decimation/decimate.js";
import { splitFaces } from "./subdivision/split.js";

// Re-export types
export * from "./types.js";
export * from "./errors.js";
export {
  DEFAULT_AGGRESSIVENESS,
  DEFAULT_MAX_PASSES,
  DEFAULT_REFRESH_INTERVAL,
  decimationOptionsSchema,
  splitOptionsSchema,
  lodLevelSchema,
} from "./config.js";
export type {
  DecimationOptions,
  ResolvedDecimationOptions,
  SplitOptions,
  LODLevelConfig,
} from "./config.js";
export {
  LogLevel,
  SystemLogger,
  configureLogger,
  resetLogger,
  createLogger,
} from "./logger.js";
export type { LogContext, LogEntry, LogSink, LoggerConfig } from "./logger.js";

// Re-export building blocks
export { MeshModel } from "./mesh/mesh-model.js";
export {
  buildWorkingMesh,
  rebuildAdjacency,
  detectBorders,
  compactTriangles,
  cleanMesh,
} from "./mesh/adjacency.js";
export { Quadric } from "./decimation/quadric.js";
export { edgeError, updateTriangleErrors } from "./decimation/edge-error.js";
export { wouldFlip } from "./decimation/foldover.js";
export { collapseEdge } from "./decimation/collapse.js";
export {
  Decimator,
  decimateMesh,
  passThreshold,
  type SimplifyParams,
} from "./decimation/decimate.js";
export { splitFaces } from "./subdivision/split.js";

/**
 * Decimate a mesh toward a target triangle count
 *
 * @param mesh Input mesh; it is not modified
 * @param options Target (absolute or as a ratio) and tuning options
 * @returns Decimation result with the simplified mesh and statistics
 * @throws InvalidMeshError if an index is out of range or a coordinate is not finite
 * @throws InvalidOptionsError if the options fail validation
 *
 * @example
 * ```typescript
 * import { decimate, MeshModel } from '@meshkit/decimation';
 *
 * const mesh = MeshModel.fromTriangles(positions, faces);
 * const result = decimate(mesh, { ratio: 0.25, aggressiveness: 7 });
 * console.log(`Reduced from ${result.originalTriangles} to ${result.finalTriangles} triangles`);
 * ```
 */
export function decimate(
  mesh: MeshModel,
  options: DecimationOptions,
): DecimationResult {
  mesh.assertValid();
  const { targetTriangleCount, ratio, aggressiveness, maxPasses, refreshInterval } =
    parseOptions(decimationOptionsSchema, options);

  const target =
    targetTriangleCount ?? Math.floor((ratio ?? 1) * mesh.triangleCount);

  return decimateMesh(mesh, {
    targetTriangleCount: target,
    aggressiveness,
    maxPasses,
    refreshInterval,
  });
}

/**
 * Reduce a mesh to roughly `targetTriangleCount` triangles.
 *
 * The target is a lower bound the run stops at, not a guaranteed count:
 * the run may also end early when the pass budget is exhausted.
 */
export function simplify(
  mesh: MeshModel,
  targetTriangleCount: number,
  aggressiveness?: number,
): MeshModel {
  return decimate(mesh, { targetTriangleCount, aggressiveness }).mesh;
}

/**
 * Subdivide every triangle around its centroid, `iterations` times
 *
 * @throws InvalidMeshError if the mesh breaks the indexed-mesh contract
 * @throws InvalidOptionsError if iterations is negative or fractional
 */
export function split(mesh: MeshModel, iterations: number): MeshModel {
  mesh.assertValid();
  const options = parseOptions(splitOptionsSchema, { iterations });
  return splitFaces(mesh, options.iterations);
}

// =============================================================================
// BUFFER CONVERSION
// =============================================================================

/**
 * Build a MeshModel from flat position and index buffers
 *
 * @throws InvalidMeshError if the buffers do not describe a valid mesh
 */
export function fromBuffers(
  positions: Float32Array | Float64Array,
  indices: Uint16Array | Uint32Array,
): MeshModel {
  if (positions.length % 3 !== 0) {
    throw new InvalidMeshError([
      `position buffer length ${positions.length} is not a multiple of 3`,
    ]);
  }

  const V: Vec3[] = [];
  for (let i = 0; i < positions.length; i += 3) {
    V.push([positions[i], positions[i + 1], positions[i + 2]]);
  }

  const mesh = new MeshModel(V, Array.from(indices));
  mesh.assertValid();
  return mesh;
}

/**
 * Convert a MeshModel to flat buffers suitable for GPU upload.
 * Normals are recomputed on a copy when the mesh has none.
 */
export function toBuffers(mesh: MeshModel): {
  positions: Float32Array;
  normals: Float32Array;
  indices: Uint32Array;
} {
  let normals = mesh.normals;
  if (normals.length !== mesh.positions.length) {
    const withNormals = mesh.clone();
    withNormals.recalculateNormals();
    normals = withNormals.normals;
  }

  const positionData = new Float32Array(mesh.positions.length * 3);
  const normalData = new Float32Array(mesh.positions.length * 3);
  for (let i = 0; i < mesh.positions.length; i++) {
    positionData.set(mesh.positions[i], i * 3);
    normalData.set(normals[i], i * 3);
  }

  return {
    positions: positionData,
    normals: normalData,
    indices: Uint32Array.from(mesh.indices),
  };
}

// =============================================================================
// BATCH DECIMATION
// =============================================================================

/**
 * Result of decimating every mesh of a scene
 */
export interface BatchDecimationResult {
  /** One result per input mesh, in order */
  results: DecimationResult[];
  /** Total triangles across the input meshes */
  trianglesBefore: number;
  /** Total triangles across the output meshes */
  trianglesAfter: number;
  /** Total processing time (ms) */
  processingTimeMs: number;
}

/**
 * Decimate each mesh independently with the same options. With `ratio`, each
 * mesh's target is taken from its own triangle count.
 */
export function decimateMeshes(
  meshes: readonly MeshModel[],
  options: DecimationOptions,
): BatchDecimationResult {
  const startTime = performance.now();
  const results = meshes.map((mesh) => decimate(mesh, options));

  let trianglesBefore = 0;
  let trianglesAfter = 0;
  for (const result of results) {
    trianglesBefore += result.originalTriangles;
    trianglesAfter += result.finalTriangles;
  }

  return {
    results,
    trianglesBefore,
    trianglesAfter,
    processingTimeMs: performance.now() - startTime,
  };
}

// =============================================================================
// BATCH LOD GENERATION
// =============================================================================

/**
 * Result for a single LOD level generation
 */
export interface LODLevelResult {
  /** LOD level name */
  name: string;
  /** Simplified mesh */
  mesh: MeshModel;
  /** Triangle count the level aimed for */
  targetTriangles: number;
  /** Original triangle count */
  originalTriangles: number;
  /** Final triangle count */
  finalTriangles: number;
  /** Original vertex count */
  originalVertices: number;
  /** Final vertex count */
  finalVertices: number;
  /** Triangle reduction percentage achieved */
  reductionPercent: number;
  /** Time taken to generate this LOD (ms) */
  processingTimeMs: number;
}

/**
 * Result of batch LOD generation
 */
export interface BatchLODResult {
  /** Results for each LOD level, in order */
  levels: LODLevelResult[];
  /** Total processing time for all levels (ms) */
  totalProcessingTimeMs: number;
  /** Statistics summary */
  summary: {
    originalTriangles: number;
    originalVertices: number;
    /** Map of level name to final triangle count */
    trianglesByLevel: Record<string, number>;
  };
}

/**
 * Default LOD level configurations
 */
export const LOD_PRESETS = {
  default: [
    { name: "lod1", ratio: 0.5, minTriangles: 64 },
    { name: "lod2", ratio: 0.25, minTriangles: 32 },
    { name: "lod3", ratio: 0.1, minTriangles: 12 },
  ],
  preview: [{ name: "preview", ratio: 0.1, minTriangles: 12 }],
  gentle: [
    { name: "lod1", ratio: 0.75, minTriangles: 64 },
    { name: "lod2", ratio: 0.5, minTriangles: 32 },
  ],
} satisfies Record<string, LODLevelConfig[]>;

export type LODPreset = keyof typeof LOD_PRESETS;

/**
 * Generate multiple LOD levels from a single mesh
 *
 * Each LOD level is decimated from the original mesh (not cascaded) to ensure
 * consistent quality at each level.
 *
 * @example
 * ```typescript
 * const result = generateLODLevels(mesh, [
 *   { name: "lod1", ratio: 0.5, minTriangles: 100 },
 *   { name: "lod2", ratio: 0.1, minTriangles: 20 },
 * ]);
 * for (const level of result.levels) {
 *   console.log(`${level.name}: ${level.finalTriangles} triangles`);
 * }
 * ```
 */
export function generateLODLevels(
  mesh: MeshModel,
  levels: readonly LODLevelConfig[],
): BatchLODResult {
  const totalStartTime = performance.now();
  const originalTriangles = mesh.triangleCount;
  const originalVertices = mesh.vertexCount;

  const results: LODLevelResult[] = [];
  const trianglesByLevel: Record<string, number> = {};

  for (const levelInput of levels) {
    const level = parseOptions(lodLevelSchema, levelInput);
    const levelStartTime = performance.now();

    const targetTriangles = Math.max(
      Math.floor(level.ratio * originalTriangles),
      level.minTriangles ?? 0,
    );

    const result = decimate(mesh, {
      targetTriangleCount: targetTriangles,
      aggressiveness: level.aggressiveness,
    });

    const reductionPercent =
      originalTriangles > 0
        ? ((originalTriangles - result.finalTriangles) / originalTriangles) *
          100
        : 0;

    results.push({
      name: level.name,
      mesh: result.mesh,
      targetTriangles,
      originalTriangles,
      finalTriangles: result.finalTriangles,
      originalVertices,
      finalVertices: result.finalVertices,
      reductionPercent,
      processingTimeMs: performance.now() - levelStartTime,
    });
    trianglesByLevel[level.name] = result.finalTriangles;
  }

  return {
    levels: results,
    totalProcessingTimeMs: performance.now() - totalStartTime,
    summary: {
      originalTriangles,
      originalVertices,
      trianglesByLevel,
    },
  };
}

/**
 * Generate LOD levels using a preset configuration
 */
export function generateLODLevelsFromPreset(
  mesh: MeshModel,
  preset: LODPreset = "default",
): BatchLODResult {
  return generateLODLevels(mesh, LOD_PRESETS[preset]);
}
