/**
 * Shared test meshes
 */

import { MeshModel, type Face, type Vec3 } from "../src/index.js";

/**
 * Flat grid in the z = 0 plane with unit spacing: (divisions + 1)² vertices
 * and 2 * divisions² triangles, all facing +z.
 * Vertex id is y * (divisions + 1) + x.
 */
export function createGrid(divisions: number = 8): MeshModel {
  const positions: Vec3[] = [];
  const faces: Face[] = [];

  for (let y = 0; y <= divisions; y++) {
    for (let x = 0; x <= divisions; x++) {
      positions.push([x, y, 0]);
    }
  }

  for (let y = 0; y < divisions; y++) {
    for (let x = 0; x < divisions; x++) {
      const a = y * (divisions + 1) + x;
      const b = a + 1;
      const d = a + divisions + 1;
      const c = d + 1;

      // Two triangles per cell
      faces.push([a, b, c]);
      faces.push([a, c, d]);
    }
  }

  return MeshModel.fromTriangles(positions, faces);
}

/**
 * Two triangles sharing the edge (0, 2), both facing +z:
 * (0, 1, 2) and (0, 2, 3)
 */
export function createFan(): MeshModel {
  return MeshModel.fromTriangles(
    [
      [0, 0, 0], // 0
      [1, 0, 0], // 1
      [0, 1, 0], // 2
      [-1, 0, 0], // 3
    ],
    [
      [0, 1, 2],
      [0, 2, 3],
    ],
  );
}

/**
 * UV-sphere-like closed mesh for more realistic testing
 */
export function createSphere(
  radius: number = 1,
  segments: number = 16,
  rings: number = 8,
): MeshModel {
  const positions: Vec3[] = [[0, radius, 0]];
  const faces: Face[] = [];

  for (let r = 1; r < rings; r++) {
    const phi = (Math.PI * r) / rings;
    for (let s = 0; s < segments; s++) {
      const theta = (2 * Math.PI * s) / segments;
      positions.push([
        radius * Math.sin(phi) * Math.cos(theta),
        radius * Math.cos(phi),
        radius * Math.sin(phi) * Math.sin(theta),
      ]);
    }
  }
  const bottom = positions.length;
  positions.push([0, -radius, 0]);

  const ring = (r: number, s: number) => 1 + (r - 1) * segments + (s % segments);

  for (let s = 0; s < segments; s++) {
    faces.push([0, ring(1, s + 1), ring(1, s)]);
  }
  for (let r = 1; r < rings - 1; r++) {
    for (let s = 0; s < segments; s++) {
      faces.push([ring(r, s), ring(r, s + 1), ring(r + 1, s + 1)]);
      faces.push([ring(r, s), ring(r + 1, s + 1), ring(r + 1, s)]);
    }
  }
  for (let s = 0; s < segments; s++) {
    faces.push([bottom, ring(rings - 1, s), ring(rings - 1, s + 1)]);
  }

  return MeshModel.fromTriangles(positions, faces);
}

/**
 * Assert-friendly summary of mesh contract violations
 */
export function meshIssues(mesh: MeshModel): string[] {
  const issues = MeshModel.validate(mesh.positions, mesh.indices);
  if (mesh.normals.length !== mesh.positions.length) {
    issues.push(
      `normals length ${mesh.normals.length} !== positions length ${mesh.positions.length}`,
    );
  }
  return issues;
}
