/**
 * Types for quadric mesh decimation and subdivision
 */

import type { Quadric } from "./decimation/quadric.js";
import type { MeshModel } from "./mesh/mesh-model.js";

/** A 3D position or direction (x, y, z) */
export type Vec3 = [number, number, number];

/** Three vertex indices of one triangle */
export type Face = [number, number, number];

/** Axis-aligned bounding box */
export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}

/**
 * Reason why decimation stopped
 */
export type StopReason =
  | "target_reached" // Live triangle count is at or below the target
  | "pass_limit"; // Pass budget exhausted before reaching the target

/**
 * Per-vertex state used while decimating
 */
export interface WorkingVertex {
  /** Current position (moved to the contraction point on collapse) */
  p: Vec3;
  /** Accumulated quadric, see {@link Quadric} */
  q: Quadric;
  /** Heuristic boundary flag, computed on the first refresh only */
  border: boolean;
  /** First slot of this vertex's range in the adjacency list */
  tstart: number;
  /** Number of adjacency slots owned by this vertex */
  tcount: number;
}

/**
 * Per-triangle state used while decimating
 */
export interface WorkingTriangle {
  v: Face;
  /** Edge errors for (v0,v1), (v1,v2), (v2,v0), then their minimum */
  err: [number, number, number, number];
  deleted: boolean;
  /** Touched by a collapse during the current pass */
  dirty: boolean;
  /** Unit face normal at the last refresh */
  n: Vec3;
}

/**
 * One incident triangle of a vertex: triangle id and the vertex's slot (0-2) in it
 */
export interface AdjacencyRef {
  tid: number;
  tvertex: number;
}

/**
 * Arena of working vertices, triangles and their shared adjacency list
 */
export interface WorkingMesh {
  vertices: WorkingVertex[];
  triangles: WorkingTriangle[];
  refs: AdjacencyRef[];
}

/**
 * Edge error with the point that achieves it
 */
export interface EdgeErrorResult {
  error: number;
  point: Vec3;
}

/**
 * Decimation result with statistics
 */
export interface DecimationResult {
  /** Simplified mesh */
  mesh: MeshModel;
  /** Original vertex count */
  originalVertices: number;
  /** Final vertex count */
  finalVertices: number;
  /** Original triangle count */
  originalTriangles: number;
  /** Final triangle count */
  finalTriangles: number;
  /** Number of committed edge collapses */
  collapses: number;
  /** Number of passes run */
  passes: number;
  /** Reason decimation stopped */
  stopReason: StopReason;
}
