/**
 * Edge collapse cost and placement
 */

import type {
  EdgeErrorResult,
  Vec3,
  WorkingTriangle,
  WorkingVertex,
} from "../types.js";
import { clone, midpoint } from "../math/vector.js";

/**
 * Error of contracting v1 and v2 into a single vertex, and where to put it.
 *
 * Uses the point minimizing Q1 + Q2 when one exists and the pair is not on
 * the border. Otherwise picks the best of p1, p2 and their midpoint; they
 * are evaluated in that order and a later candidate with an equal error
 * replaces an earlier one.
 */
export function edgeError(
  vertices: readonly WorkingVertex[],
  v1: number,
  v2: number,
): EdgeErrorResult {
  const a = vertices[v1];
  const b = vertices[v2];
  const q = a.q.add(b.q);

  if (!(a.border && b.border)) {
    const optimal = q.optimalPoint();
    if (optimal) {
      return { error: q.evaluate(optimal), point: optimal };
    }
  }

  const p3 = midpoint(a.p, b.p);
  const error1 = q.evaluate(a.p);
  const error2 = q.evaluate(b.p);
  const error3 = q.evaluate(p3);
  const error = Math.min(error1, error2, error3);

  let point: Vec3;
  if (error3 === error) {
    point = p3;
  } else if (error2 === error) {
    point = clone(b.p);
  } else {
    point = clone(a.p);
  }
  return { error, point };
}

/**
 * Recompute the three edge errors of a triangle and their minimum
 */
export function updateTriangleErrors(
  vertices: readonly WorkingVertex[],
  t: WorkingTriangle,
): void {
  t.err[0] = edgeError(vertices, t.v[0], t.v[1]).error;
  t.err[1] = edgeError(vertices, t.v[1], t.v[2]).error;
  t.err[2] = edgeError(vertices, t.v[2], t.v[0]).error;
  t.err[3] = Math.min(t.err[0], t.err[1], t.err[2]);
}
