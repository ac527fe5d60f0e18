/**
 * Foldover detection
 *
 * Detects when moving a vertex to a contraction point would turn one of its
 * incident triangles into a sliver or fold it over.
 */

import type { Vec3, WorkingMesh } from "../types.js";
import { cross, dot, normalize, sub } from "../math/vector.js";

/** |cos| above this means the two edges are within ~2.6° of colinear */
const COLINEAR_DOT = 0.999;

/** Normals closer than this in cosine (~78°) are accepted */
const MIN_NORMAL_DOT = 0.2;

/**
 * Check whether moving `vertexId` to `point` would flip a face.
 *
 * Triangles that also contain `excludedId` degenerate when the edge
 * collapses; they are flagged in `deleted` (indexed by position in the
 * vertex's adjacency range) instead of being tested. `deleted` is cleared
 * and sized to the range before the scan.
 *
 * @returns true if any live incident triangle would become a sliver or
 * turn by more than the allowed angle
 */
export function wouldFlip(
  mesh: WorkingMesh,
  point: Vec3,
  excludedId: number,
  vertexId: number,
  deleted: boolean[],
): boolean {
  const { vertices, triangles, refs } = mesh;
  const v = vertices[vertexId];

  deleted.length = v.tcount;
  deleted.fill(false);

  for (let k = 0; k < v.tcount; k++) {
    const r = refs[v.tstart + k];
    const t = triangles[r.tid];
    if (t.deleted) continue;

    const id1 = t.v[(r.tvertex + 1) % 3];
    const id2 = t.v[(r.tvertex + 2) % 3];

    if (id1 === excludedId || id2 === excludedId) {
      deleted[k] = true;
      continue;
    }

    const d1 = normalize(sub(vertices[id1].p, point));
    const d2 = normalize(sub(vertices[id2].p, point));
    if (Math.abs(dot(d1, d2)) > COLINEAR_DOT) {
      return true;
    }

    const n = normalize(cross(d1, d2));
    if (dot(n, t.n) < MIN_NORMAL_DOT) {
      return true;
    }
  }

  return false;
}
