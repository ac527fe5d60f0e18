/**
 * Uniform triangle subdivision
 *
 * Each pass inserts a vertex at every triangle's centroid and replaces the
 * triangle with a fan of three.
 */

import type { Vec3 } from "../types.js";
import { createLogger } from "../logger.js";
import { MeshModel } from "../mesh/mesh-model.js";

const logger = createLogger("Subdivide");

/**
 * Split every triangle of an already validated mesh `iterations` times.
 *
 * The input is left untouched. Every pass reads the previous pass's full
 * output and writes a new index buffer, so the triangle count is
 * multiplied by 3 per pass and the vertex count grows by the pre-pass
 * triangle count.
 */
export function splitFaces(input: MeshModel, iterations: number): MeshModel {
  const mesh = input.clone();

  for (let pass = 0; pass < iterations; pass++) {
    const indices = mesh.indices;
    const next: number[] = [];

    for (let i = 0; i + 2 < indices.length; i += 3) {
      const a = indices[i];
      const b = indices[i + 1];
      const c = indices[i + 2];
      const pa = mesh.positions[a];
      const pb = mesh.positions[b];
      const pc = mesh.positions[c];

      const centroid: Vec3 = [
        (pa[0] + pb[0] + pc[0]) / 3,
        (pa[1] + pb[1] + pc[1]) / 3,
        (pa[2] + pb[2] + pc[2]) / 3,
      ];
      const m = mesh.positions.length;
      mesh.positions.push(centroid);

      next.push(a, b, m, b, c, m, c, a, m);
    }

    mesh.indices = next;
    logger.debug("split pass", {
      pass,
      triangles: mesh.triangleCount,
      vertices: mesh.vertexCount,
    });
  }

  mesh.recalculateNormals();
  return mesh;
}
