/**
 * Main decimation algorithm
 *
 * Iterative quadric edge collapse over an index-addressed working mesh.
 * Each pass accepts collapses whose error is below a threshold that grows
 * with the pass number; adjacency is rebuilt only every few passes and is
 * allowed to go stale in between.
 */

import type {
  DecimationResult,
  StopReason,
  WorkingMesh,
} from "../types.js";
import {
  DEFAULT_AGGRESSIVENESS,
  DEFAULT_MAX_PASSES,
  DEFAULT_REFRESH_INTERVAL,
} from "../config.js";
import { createLogger } from "../logger.js";
import { faceNormal, normalize } from "../math/vector.js";
import {
  buildWorkingMesh,
  cleanMesh,
  compactTriangles,
  detectBorders,
  rebuildAdjacency,
} from "../mesh/adjacency.js";
import type { MeshModel } from "../mesh/mesh-model.js";
import { Quadric } from "./quadric.js";
import { edgeError, updateTriangleErrors } from "./edge-error.js";
import { wouldFlip } from "./foldover.js";
import { collapseEdge } from "./collapse.js";

const logger = createLogger("Decimator");

/** Scale of the per-pass error threshold */
const THRESHOLD_BASE = 1e-9;

export interface SimplifyParams {
  targetTriangleCount: number;
  aggressiveness?: number;
  maxPasses?: number;
  refreshInterval?: number;
}

/**
 * Error accepted on a given pass: 1e-9 * (pass + 3)^aggressiveness
 */
export function passThreshold(pass: number, aggressiveness: number): number {
  return THRESHOLD_BASE * Math.pow(pass + 3, aggressiveness);
}

type DecimatorState = "built" | "simplified" | "extracted";

/**
 * One decimation run: build from a mesh, simplify, then extract the result.
 * An instance cannot be reused.
 */
export class Decimator {
  private readonly mesh: WorkingMesh;
  private readonly originalVertices: number;
  private readonly originalTriangles: number;
  private state: DecimatorState = "built";

  private deletedTriangles = 0;
  private collapses = 0;
  private passes = 0;
  private stopReason: StopReason = "target_reached";

  // Foldover flags for the two endpoints of the candidate edge
  private readonly deleted0: boolean[] = [];
  private readonly deleted1: boolean[] = [];

  constructor(source: MeshModel) {
    const { vertices, triangles } = buildWorkingMesh(source);
    this.mesh = { vertices, triangles, refs: [] };
    this.originalVertices = vertices.length;
    this.originalTriangles = triangles.length;
  }

  /** Triangles not yet deleted */
  get liveTriangles(): number {
    return this.originalTriangles - this.deletedTriangles;
  }

  /**
   * Rebuild adjacency. On pass 0 also compute border flags, quadrics,
   * face normals and edge errors.
   */
  refresh(pass: number): void {
    const mesh = this.mesh;
    if (pass > 0) {
      mesh.triangles = compactTriangles(mesh.triangles);
    }
    mesh.refs = rebuildAdjacency(mesh.vertices, mesh.triangles);

    if (pass === 0) {
      detectBorders(mesh.vertices, mesh.triangles, mesh.refs);
      this.computeQuadrics();
      for (const t of mesh.triangles) {
        updateTriangleErrors(mesh.vertices, t);
      }
    }

    logger.debug("refresh", {
      pass,
      triangles: mesh.triangles.length,
      refs: mesh.refs.length,
    });
  }

  private computeQuadrics(): void {
    const { vertices, triangles } = this.mesh;
    for (const v of vertices) {
      v.q = new Quadric();
    }
    for (const t of triangles) {
      const p0 = vertices[t.v[0]].p;
      const n = normalize(
        faceNormal(p0, vertices[t.v[1]].p, vertices[t.v[2]].p),
      );
      t.n = n;
      const plane = Quadric.fromPointNormal(p0, n);
      for (const vi of t.v) {
        vertices[vi].q.addInPlace(plane);
      }
    }
  }

  /**
   * Collapse edges until the live triangle count reaches the target or the
   * pass budget runs out
   */
  simplify(params: SimplifyParams): void {
    if (this.state !== "built") {
      throw new Error(`Decimator.simplify called in state "${this.state}"`);
    }
    this.state = "simplified";

    const {
      targetTriangleCount,
      aggressiveness = DEFAULT_AGGRESSIVENESS,
      maxPasses = DEFAULT_MAX_PASSES,
      refreshInterval = DEFAULT_REFRESH_INTERVAL,
    } = params;

    for (let pass = 0; pass < maxPasses; pass++) {
      if (this.liveTriangles <= targetTriangleCount) break;

      if (pass % refreshInterval === 0) {
        this.refresh(pass);
      }

      for (const t of this.mesh.triangles) {
        t.dirty = false;
      }

      this.passes = pass + 1;
      this.runPass(passThreshold(pass, aggressiveness), targetTriangleCount);
    }

    if (this.liveTriangles <= targetTriangleCount) {
      this.stopReason = "target_reached";
    } else {
      this.stopReason = "pass_limit";
      logger.info("pass budget exhausted before reaching target", {
        passes: this.passes,
        target: targetTriangleCount,
        remaining: this.liveTriangles,
      });
    }
  }

  private runPass(threshold: number, targetTriangleCount: number): void {
    const { vertices, triangles } = this.mesh;

    for (let i = 0; i < triangles.length; i++) {
      const t = triangles[i];
      if (t.deleted || t.dirty || t.err[3] > threshold) continue;

      for (let j = 0; j < 3; j++) {
        if (!(t.err[j] < threshold)) continue;

        const i0 = t.v[j];
        const i1 = t.v[(j + 1) % 3];

        // Never merge a border vertex into an interior one
        if (vertices[i0].border !== vertices[i1].border) continue;

        const { point } = edgeError(vertices, i0, i1);

        if (wouldFlip(this.mesh, point, i1, i0, this.deleted0)) continue;
        if (wouldFlip(this.mesh, point, i0, i1, this.deleted1)) continue;

        this.deletedTriangles += collapseEdge(
          this.mesh,
          i0,
          i1,
          point,
          this.deleted0,
          this.deleted1,
        );
        this.collapses++;
        break;
      }

      if (this.liveTriangles <= targetTriangleCount) break;
    }
  }

  /**
   * Compact the working mesh into a new MeshModel with fresh normals
   */
  extract(): DecimationResult {
    if (this.state !== "simplified") {
      throw new Error(`Decimator.extract called in state "${this.state}"`);
    }
    this.state = "extracted";

    const mesh = cleanMesh(this.mesh.vertices, this.mesh.triangles);

    logger.debug("decimation finished", {
      passes: this.passes,
      collapses: this.collapses,
      triangles: mesh.triangleCount,
      vertices: mesh.vertexCount,
      stopReason: this.stopReason,
    });

    return {
      mesh,
      originalVertices: this.originalVertices,
      finalVertices: mesh.vertexCount,
      originalTriangles: this.originalTriangles,
      finalTriangles: mesh.triangleCount,
      collapses: this.collapses,
      passes: this.passes,
      stopReason: this.stopReason,
    };
  }
}

/**
 * Run one decimation of an already validated mesh.
 *
 * A target at or above the current triangle count returns a copy of the
 * input with recomputed normals.
 */
export function decimateMesh(
  input: MeshModel,
  params: SimplifyParams,
): DecimationResult {
  const originalTriangles = input.triangleCount;

  if (params.targetTriangleCount >= originalTriangles) {
    const mesh = input.clone();
    mesh.recalculateNormals();
    return {
      mesh,
      originalVertices: input.vertexCount,
      finalVertices: mesh.vertexCount,
      originalTriangles,
      finalTriangles: originalTriangles,
      collapses: 0,
      passes: 0,
      stopReason: "target_reached",
    };
  }

  const decimator = new Decimator(input);
  decimator.simplify(params);
  return decimator.extract();
}
