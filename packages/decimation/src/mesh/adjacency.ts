/**
 * Working mesh structures for decimation
 *
 * Vertices and triangles refer to each other only by integer index. Each
 * vertex owns a contiguous (tstart, tcount) range of the shared adjacency
 * list, one entry per incident triangle.
 */

import type {
  AdjacencyRef,
  Vec3,
  WorkingTriangle,
  WorkingVertex,
} from "../types.js";
import { Quadric } from "../decimation/quadric.js";
import { clone, zero } from "../math/vector.js";
import { MeshModel } from "./mesh-model.js";

/**
 * Copy a mesh into fresh working vertices and triangles.
 * Nothing in the result aliases the mesh's storage.
 */
export function buildWorkingMesh(mesh: MeshModel): {
  vertices: WorkingVertex[];
  triangles: WorkingTriangle[];
} {
  const vertices: WorkingVertex[] = mesh.positions.map((p) => ({
    p: clone(p),
    q: new Quadric(),
    border: false,
    tstart: 0,
    tcount: 0,
  }));

  const triangles: WorkingTriangle[] = [];
  for (let i = 0; i + 2 < mesh.indices.length; i += 3) {
    triangles.push({
      v: [mesh.indices[i], mesh.indices[i + 1], mesh.indices[i + 2]],
      err: [0, 0, 0, 0],
      deleted: false,
      dirty: false,
      n: zero(),
    });
  }

  return { vertices, triangles };
}

/**
 * Drop deleted triangles, keeping the order of the rest
 */
export function compactTriangles(
  triangles: WorkingTriangle[],
): WorkingTriangle[] {
  return triangles.filter((t) => !t.deleted);
}

/**
 * Recompute every vertex's adjacency range and fill a new adjacency list.
 *
 * Counts references per vertex, assigns ranges by prefix sum, then writes
 * each (triangle, slot) pair through a per-vertex cursor.
 */
export function rebuildAdjacency(
  vertices: WorkingVertex[],
  triangles: readonly WorkingTriangle[],
): AdjacencyRef[] {
  for (const v of vertices) {
    v.tstart = 0;
    v.tcount = 0;
  }
  for (const t of triangles) {
    vertices[t.v[0]].tcount++;
    vertices[t.v[1]].tcount++;
    vertices[t.v[2]].tcount++;
  }

  let tstart = 0;
  for (const v of vertices) {
    v.tstart = tstart;
    tstart += v.tcount;
    v.tcount = 0;
  }

  const refs: AdjacencyRef[] = new Array(triangles.length * 3);
  for (let tid = 0; tid < triangles.length; tid++) {
    const t = triangles[tid];
    for (let j = 0; j < 3; j++) {
      const v = vertices[t.v[j]];
      refs[v.tstart + v.tcount] = { tid, tvertex: j };
      v.tcount++;
    }
  }

  return refs;
}

/**
 * Flag border vertices by adjacency multiplicity.
 *
 * For every vertex, count how often each vertex id appears across its
 * incident triangles. An id seen exactly once marks that vertex as border.
 * On a closed manifold every neighbour is shared by two incident triangles,
 * so this only approximates a true open-edge test.
 */
export function detectBorders(
  vertices: WorkingVertex[],
  triangles: readonly WorkingTriangle[],
  refs: readonly AdjacencyRef[],
): void {
  for (const v of vertices) {
    v.border = false;
  }

  const counts = new Map<number, number>();
  for (const v of vertices) {
    counts.clear();
    for (let k = 0; k < v.tcount; k++) {
      const t = triangles[refs[v.tstart + k].tid];
      for (const id of t.v) {
        counts.set(id, (counts.get(id) ?? 0) + 1);
      }
    }
    for (const [id, count] of counts) {
      if (count === 1) {
        vertices[id].border = true;
      }
    }
  }
}

/**
 * Build the output mesh from the working structures: drop deleted
 * triangles, drop vertices no surviving triangle references, and renumber
 * the remaining vertices in their original order.
 */
export function cleanMesh(
  vertices: readonly WorkingVertex[],
  triangles: readonly WorkingTriangle[],
): MeshModel {
  const live = triangles.filter((t) => !t.deleted);

  const remap = new Int32Array(vertices.length).fill(-1);
  for (const t of live) {
    remap[t.v[0]] = 0;
    remap[t.v[1]] = 0;
    remap[t.v[2]] = 0;
  }

  const positions: Vec3[] = [];
  for (let vi = 0; vi < vertices.length; vi++) {
    if (remap[vi] === -1) continue;
    remap[vi] = positions.length;
    positions.push(clone(vertices[vi].p));
  }

  const indices: number[] = [];
  for (const t of live) {
    indices.push(remap[t.v[0]], remap[t.v[1]], remap[t.v[2]]);
  }

  const mesh = new MeshModel(positions, indices);
  mesh.recalculateNormals();
  return mesh;
}
