/**
 * Edge collapse operations for mesh decimation
 */

import type { Vec3, WorkingMesh } from "../types.js";
import { updateTriangleErrors } from "./edge-error.js";

/**
 * Re-point the triangles around `vertexId` to `survivorId`.
 *
 * Triangles flagged in `deleted` are tombstoned instead. Every re-pointed
 * triangle is marked dirty, gets fresh edge errors, and has its adjacency
 * entry appended to the end of the shared list.
 *
 * @returns number of triangles deleted
 */
function repointTriangles(
  mesh: WorkingMesh,
  survivorId: number,
  vertexId: number,
  deleted: readonly boolean[],
): number {
  const { vertices, triangles, refs } = mesh;
  const v = vertices[vertexId];
  let removed = 0;

  for (let k = 0; k < v.tcount; k++) {
    const r = refs[v.tstart + k];
    const t = triangles[r.tid];
    if (t.deleted) continue;

    if (deleted[k]) {
      t.deleted = true;
      removed++;
      continue;
    }

    t.v[r.tvertex] = survivorId;
    t.dirty = true;
    updateTriangleErrors(vertices, t);

    refs.push({ tid: r.tid, tvertex: r.tvertex });
  }

  return removed;
}

/**
 * Collapse the edge (i0, i1) into i0 placed at `point`.
 *
 * `deleted0` and `deleted1` are the flags written by the foldover test for
 * i0 and i1. The merged adjacency of i0 is written back over its old range
 * when it fits, otherwise i0 takes over the appended entries.
 *
 * @returns number of triangles deleted
 */
export function collapseEdge(
  mesh: WorkingMesh,
  i0: number,
  i1: number,
  point: Vec3,
  deleted0: readonly boolean[],
  deleted1: readonly boolean[],
): number {
  const { vertices, refs } = mesh;
  const v0 = vertices[i0];
  const v1 = vertices[i1];

  v0.p = point;
  v0.q = v1.q.add(v0.q);

  const tstart = refs.length;
  let removed = repointTriangles(mesh, i0, i0, deleted0);
  removed += repointTriangles(mesh, i0, i1, deleted1);
  const tcount = refs.length - tstart;

  if (tcount <= v0.tcount) {
    for (let i = 0; i < tcount; i++) {
      refs[v0.tstart + i] = refs[tstart + i];
    }
    refs.length = tstart;
  } else {
    v0.tstart = tstart;
  }
  v0.tcount = tcount;

  return removed;
}
