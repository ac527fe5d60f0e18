/**
 * Indexed triangle mesh
 */

import type { BoundingBox, Face, Vec3 } from "../types.js";
import { InvalidMeshError } from "../errors.js";
import { addInPlace, clone, faceNormal, normalize, zero } from "../math/vector.js";

/**
 * Indexed mesh: vertex positions, per-vertex normals and a flat triangle
 * index list (three consecutive indices per triangle).
 */
export class MeshModel {
  /** Vertex positions */
  positions: Vec3[];
  /** Vertex normals, parallel to positions once computed */
  normals: Vec3[];
  /** Triangle indices into positions (#T x 3, flattened) */
  indices: number[];

  constructor(
    positions: Vec3[] = [],
    indices: number[] = [],
    normals: Vec3[] = [],
  ) {
    this.positions = positions;
    this.indices = indices;
    this.normals = normals;
  }

  /**
   * Build a mesh from per-triangle index tuples
   */
  static fromTriangles(positions: Vec3[], faces: Face[]): MeshModel {
    const indices: number[] = [];
    for (const face of faces) {
      indices.push(face[0], face[1], face[2]);
    }
    return new MeshModel(positions, indices);
  }

  /**
   * Box centred on the origin with 8 vertices and 12 outward-facing
   * triangles. With the default size this is the unit box.
   */
  static box(size: Vec3 = [1, 1, 1]): MeshModel {
    const hx = size[0] / 2;
    const hy = size[1] / 2;
    const hz = size[2] / 2;

    const positions: Vec3[] = [
      [-hx, -hy, -hz], // 0
      [hx, -hy, -hz], // 1
      [-hx, hy, -hz], // 2
      [hx, hy, -hz], // 3
      [-hx, -hy, hz], // 4
      [hx, -hy, hz], // 5
      [-hx, hy, hz], // 6
      [hx, hy, hz], // 7
    ];

    const indices = [
      // Back (z = -hz)
      1, 0, 2, 2, 3, 1,
      // Right (x = +hx)
      5, 1, 7, 3, 7, 1,
      // Front (z = +hz)
      4, 5, 6, 7, 6, 5,
      // Left (x = -hx)
      0, 4, 2, 6, 2, 4,
      // Top (y = +hy)
      3, 2, 7, 6, 7, 2,
      // Bottom (y = -hy)
      1, 4, 0, 4, 1, 5,
    ];

    const box = new MeshModel(positions, indices);
    box.recalculateNormals();
    return box;
  }

  /**
   * Collect contract violations: partial triangles, out-of-range or
   * non-integer indices, non-finite coordinates
   */
  static validate(positions: readonly Vec3[], indices: readonly number[]): string[] {
    const issues: string[] = [];

    if (indices.length % 3 !== 0) {
      issues.push(`index count ${indices.length} is not a multiple of 3`);
    }

    for (let i = 0; i < indices.length; i++) {
      const index = indices[i];
      if (!Number.isInteger(index) || index < 0 || index >= positions.length) {
        issues.push(
          `indices[${i}] = ${index} is out of range [0, ${positions.length - 1}]`,
        );
      }
    }

    for (let vi = 0; vi < positions.length; vi++) {
      const p = positions[vi];
      if (
        !Number.isFinite(p[0]) ||
        !Number.isFinite(p[1]) ||
        !Number.isFinite(p[2])
      ) {
        issues.push(`positions[${vi}] = [${p}] contains non-finite values`);
      }
    }

    return issues;
  }

  /**
   * @throws InvalidMeshError if the mesh breaks the indexed-mesh contract
   */
  assertValid(): void {
    const issues = MeshModel.validate(this.positions, this.indices);
    if (issues.length > 0) {
      throw new InvalidMeshError(issues);
    }
  }

  get vertexCount(): number {
    return this.positions.length;
  }

  get triangleCount(): number {
    return Math.floor(this.indices.length / 3);
  }

  /** True if positions, normals or indices is empty */
  get isEmpty(): boolean {
    return (
      this.positions.length === 0 ||
      this.normals.length === 0 ||
      this.indices.length === 0
    );
  }

  clear(): void {
    this.positions = [];
    this.normals = [];
    this.indices = [];
  }

  /**
   * Create a deep copy that shares no storage with this mesh
   */
  clone(): MeshModel {
    return new MeshModel(
      this.positions.map(clone),
      [...this.indices],
      this.normals.map(clone),
    );
  }

  /**
   * Area-weighted vertex normals.
   *
   * Each triangle adds its unnormalized face normal to its three vertices;
   * the sums are then normalized. A vertex with no accumulated area (an
   * unreferenced vertex, or one surrounded by degenerate triangles) gets the
   * zero normal.
   */
  recalculateNormals(): void {
    const normals: Vec3[] = this.positions.map(() => zero());

    for (let i = 0; i + 2 < this.indices.length; i += 3) {
      const i0 = this.indices[i];
      const i1 = this.indices[i + 1];
      const i2 = this.indices[i + 2];
      const n = faceNormal(
        this.positions[i0],
        this.positions[i1],
        this.positions[i2],
      );
      addInPlace(normals[i0], n);
      addInPlace(normals[i1], n);
      addInPlace(normals[i2], n);
    }

    this.normals = normals.map(normalize);
  }

  /** Mean of all positions; the origin for a mesh without positions */
  centroid(): Vec3 {
    const center = zero();
    if (this.positions.length === 0) return center;
    for (const p of this.positions) {
      addInPlace(center, p);
    }
    const inv = 1 / this.positions.length;
    return [center[0] * inv, center[1] * inv, center[2] * inv];
  }

  /** Component-wise min/max of positions; null for a mesh without positions */
  boundingBox(): BoundingBox | null {
    if (this.positions.length === 0) return null;

    const min: Vec3 = [Infinity, Infinity, Infinity];
    const max: Vec3 = [-Infinity, -Infinity, -Infinity];
    for (const p of this.positions) {
      for (let k = 0; k < 3; k++) {
        if (p[k] < min[k]) min[k] = p[k];
        if (p[k] > max[k]) max[k] = p[k];
      }
    }
    return { min, max };
  }
}
