/**
 * Mesh model tests
 */

import { describe, it, expect } from "vitest";
import { MeshModel, InvalidMeshError, type Vec3 } from "../src/index.js";
import { createGrid } from "./fixtures.js";

function expectVecClose(actual: Vec3, expected: Vec3, digits: number = 9) {
  expect(actual[0]).toBeCloseTo(expected[0], digits);
  expect(actual[1]).toBeCloseTo(expected[1], digits);
  expect(actual[2]).toBeCloseTo(expected[2], digits);
}

describe("MeshModel", () => {
  describe("construction", () => {
    it("flattens faces into the index list", () => {
      const mesh = MeshModel.fromTriangles(
        [
          [0, 0, 0],
          [1, 0, 0],
          [0, 1, 0],
          [1, 1, 0],
        ],
        [
          [0, 1, 2],
          [2, 1, 3],
        ],
      );

      expect(mesh.indices).toEqual([0, 1, 2, 2, 1, 3]);
      expect(mesh.vertexCount).toBe(4);
      expect(mesh.triangleCount).toBe(2);
      expect(mesh.normals).toEqual([]);
    });

    it("builds a closed unit box", () => {
      const box = MeshModel.box();

      expect(box.vertexCount).toBe(8);
      expect(box.triangleCount).toBe(12);
      expect(box.normals.length).toBe(8);
    });

    it("gives box corners outward area-weighted normals", () => {
      const box = MeshModel.box();
      const s = 1 / Math.sqrt(3);

      // Corners 0 and 1 touch the same number of triangles on each face
      expectVecClose(box.normals[0], [-s, -s, -s]);
      expectVecClose(box.normals[1], [s, -s, -s]);
      // Corner 7: two right, one front and two top triangles
      expectVecClose(box.normals[7], [2 / 3, 2 / 3, 1 / 3]);
    });

    it("scales the box by size", () => {
      const bbox = MeshModel.box([2, 4, 6]).boundingBox();
      expect(bbox).toEqual({ min: [-1, -2, -3], max: [1, 2, 3] });
    });
  });

  describe("validate", () => {
    it("accepts a well-formed mesh", () => {
      const box = MeshModel.box();
      expect(MeshModel.validate(box.positions, box.indices)).toEqual([]);
      expect(() => box.assertValid()).not.toThrow();
    });

    it("reports out-of-range indices", () => {
      const issues = MeshModel.validate([[0, 0, 0]], [0, 1, 2]);
      expect(issues).toEqual([
        "indices[1] = 1 is out of range [0, 0]",
        "indices[2] = 2 is out of range [0, 0]",
      ]);
    });

    it("reports negative and fractional indices", () => {
      const positions: Vec3[] = [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
      ];
      const issues = MeshModel.validate(positions, [0, -1, 1.5]);
      expect(issues).toEqual([
        "indices[1] = -1 is out of range [0, 2]",
        "indices[2] = 1.5 is out of range [0, 2]",
      ]);
    });

    it("reports a partial triangle", () => {
      const positions: Vec3[] = [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
      ];
      expect(MeshModel.validate(positions, [0, 1, 2, 0])).toEqual([
        "index count 4 is not a multiple of 3",
      ]);
    });

    it("reports non-finite coordinates", () => {
      const positions: Vec3[] = [
        [NaN, 0, 0],
        [1, 0, 0],
        [0, Infinity, 0],
      ];
      expect(MeshModel.validate(positions, [0, 1, 2])).toEqual([
        "positions[0] = [NaN,0,0] contains non-finite values",
        "positions[2] = [0,Infinity,0] contains non-finite values",
      ]);
    });

    it("assertValid throws InvalidMeshError carrying the issues", () => {
      const mesh = new MeshModel([[0, 0, 0]], [0, 0, 3]);

      expect(() => mesh.assertValid()).toThrow(InvalidMeshError);
      try {
        mesh.assertValid();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidMeshError);
        if (error instanceof InvalidMeshError) {
          expect(error.code).toBe("INVALID_MESH");
          expect(error.issues).toEqual([
            "indices[2] = 3 is out of range [0, 0]",
          ]);
          expect(error.message).toBe(
            "Invalid mesh: indices[2] = 3 is out of range [0, 0]",
          );
        }
      }
    });
  });

  describe("normals", () => {
    it("computes unit normals for a flat grid", () => {
      const grid = createGrid(2);
      grid.recalculateNormals();

      expect(grid.normals.length).toBe(9);
      for (const n of grid.normals) {
        expectVecClose(n, [0, 0, 1]);
      }
    });

    it("gives unreferenced vertices the zero normal", () => {
      const mesh = new MeshModel(
        [
          [0, 0, 0],
          [1, 0, 0],
          [0, 1, 0],
          [5, 5, 5],
        ],
        [0, 1, 2],
      );
      mesh.recalculateNormals();

      expect(mesh.normals[3]).toEqual([0, 0, 0]);
      expectVecClose(mesh.normals[0], [0, 0, 1]);
    });

    it("gives vertices of degenerate triangles the zero normal", () => {
      const mesh = new MeshModel(
        [
          [0, 0, 0],
          [1, 0, 0],
          [2, 0, 0],
        ],
        [0, 1, 2],
      );
      mesh.recalculateNormals();

      expect(mesh.normals).toEqual([
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ]);
    });

    it("discards previous normals", () => {
      const grid = createGrid(1);
      grid.normals = grid.positions.map((): Vec3 => [5, 5, 5]);
      grid.recalculateNormals();

      for (const n of grid.normals) {
        expectVecClose(n, [0, 0, 1]);
      }
    });
  });

  describe("queries", () => {
    it("computes the centroid", () => {
      expectVecClose(MeshModel.box().centroid(), [0, 0, 0]);
      expectVecClose(createGrid(2).centroid(), [1, 1, 0]);
    });

    it("returns the origin as centroid of an empty mesh", () => {
      expect(new MeshModel().centroid()).toEqual([0, 0, 0]);
    });

    it("computes the bounding box", () => {
      expect(MeshModel.box().boundingBox()).toEqual({
        min: [-0.5, -0.5, -0.5],
        max: [0.5, 0.5, 0.5],
      });
    });

    it("returns null as bounding box of an empty mesh", () => {
      expect(new MeshModel().boundingBox()).toBeNull();
    });

    it("isEmpty is true when any buffer is empty", () => {
      expect(new MeshModel().isEmpty).toBe(true);
      expect(createGrid(1).isEmpty).toBe(true);
      expect(MeshModel.box().isEmpty).toBe(false);
    });

    it("clear empties every buffer", () => {
      const box = MeshModel.box();
      box.clear();

      expect(box.positions).toEqual([]);
      expect(box.normals).toEqual([]);
      expect(box.indices).toEqual([]);
      expect(box.isEmpty).toBe(true);
    });
  });

  describe("clone", () => {
    it("creates a deep copy", () => {
      const box = MeshModel.box();
      const copy = box.clone();

      expect(copy.positions).toEqual(box.positions);
      expect(copy.normals).toEqual(box.normals);
      expect(copy.indices).toEqual(box.indices);

      copy.positions[0][0] = 42;
      copy.normals[0][1] = 42;
      copy.indices[0] = 7;

      expect(box.positions[0][0]).toBe(-0.5);
      expect(box.normals[0][1]).toBeCloseTo(-1 / Math.sqrt(3), 9);
      expect(box.indices[0]).toBe(1);
    });
  });
});
