/**
 * Vector math utilities
 */

import type { Vec3 } from "../types.js";

/** Lengths below this are treated as zero when normalizing */
export const EPS = 1e-12;

/** Create a zero vector */
export function zero(): Vec3 {
  return [0, 0, 0];
}

/** Clone a vector */
export function clone(v: Vec3): Vec3 {
  return [v[0], v[1], v[2]];
}

/** Add two vectors */
export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/** Add b into a in place */
export function addInPlace(a: Vec3, b: Vec3): void {
  a[0] += b[0];
  a[1] += b[1];
  a[2] += b[2];
}

/** Subtract two vectors (a - b) */
export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Multiply vector by scalar */
export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/** Dot product of two vectors */
export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

/** Cross product of two vectors */
export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** Euclidean norm (length) */
export function norm(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Unit vector in the direction of v.
 * Returns the zero vector when v is shorter than EPS.
 */
export function normalize(v: Vec3): Vec3 {
  const n = norm(v);
  if (n < EPS) return zero();
  return scale(v, 1 / n);
}

/** Midpoint between two points */
export function midpoint(a: Vec3, b: Vec3): Vec3 {
  return scale(add(a, b), 0.5);
}

/** Unnormalized normal of triangle (a, b, c); its length is twice the area */
export function faceNormal(a: Vec3, b: Vec3, c: Vec3): Vec3 {
  return cross(sub(b, a), sub(c, a));
}

/** Check if vectors are equal (within epsilon) */
export function equals(a: Vec3, b: Vec3, eps: number = 1e-9): boolean {
  return (
    Math.abs(a[0] - b[0]) <= eps &&
    Math.abs(a[1] - b[1]) <= eps &&
    Math.abs(a[2] - b[2]) <= eps
  );
}
