/**
 * ShapeIntersection - Ray vs. primitive tests.
 *
 * Each primitive has one rule returning the nearest qualifying intersection
 * (or null). `intersectShape` dispatches on the shape's `type` tag; adding a
 * primitive means adding a union member and one case here.
 *
 * Qualifying distances:
 * - minDistance = 0 (primary rays): t >= 0
 * - minDistance > 0 (shadow / reflection rays): t > minDistance, so a ray
 *   leaving a surface does not register that surface again at t ≈ 0
 */

import { RayUtils } from "@/math/Ray";
import { Vec3 } from "@/math/Vec3";
import type { Intersection, Plane, Ray, Shape, Sphere } from "@/types";

/**
 * Whether a ray parameter lies beyond the minimum distance.
 */
export function isBeyond(t: number, minDistance: number): boolean {
  if (Number.isNaN(t)) return false;
  return minDistance === 0 ? t >= 0 : t > minDistance;
}

/**
 * Intersect a ray with a sphere.
 *
 * Solves a·t² + b·t + c = 0 with
 *   a = |d|², b = 2 d·(o − centre), c = |o − centre|² − r²
 * and keeps the smaller of the two roots that qualifies. For an origin
 * inside the sphere that is the exit point.
 */
export function intersectSphere(
  sphere: Sphere,
  ray: Ray,
  minDistance: number
): Intersection | null {
  const a = Vec3.lengthSquared(ray.direction);
  if (a === 0) {
    // Zero-length direction never reaches anything
    return null;
  }

  const difference = Vec3.subtract(ray.origin, sphere.centre);
  const b = 2 * Vec3.dot(ray.direction, difference);
  const c = Vec3.lengthSquared(difference) - sphere.radius * sphere.radius;
  const discriminant = b * b - 4 * a * c;

  if (discriminant < 0) {
    return null;
  }

  const root = Math.sqrt(discriminant);
  const near = (-b - root) / (2 * a);
  const far = (-b + root) / (2 * a);

  const t = isBeyond(near, minDistance) ? near : isBeyond(far, minDistance) ? far : null;
  if (t === null) {
    return null;
  }

  const pos = RayUtils.pointAt(ray, t);
  return {
    t,
    pos,
    normal: Vec3.normalize(Vec3.subtract(pos, sphere.centre)),
  };
}

/**
 * Intersect a ray with an infinite plane.
 *
 * The normal is returned as stored; back faces are not flipped toward the ray.
 */
export function intersectPlane(
  plane: Plane,
  ray: Ray,
  minDistance: number
): Intersection | null {
  const denominator = Vec3.dot(plane.normal, ray.direction);

  // Parallel (or zero-length direction)
  if (denominator === 0) {
    return null;
  }

  const t = Vec3.dot(plane.normal, Vec3.subtract(plane.point, ray.origin)) / denominator;
  if (!isBeyond(t, minDistance)) {
    return null;
  }

  return {
    t,
    pos: RayUtils.pointAt(ray, t),
    normal: plane.normal,
  };
}

/**
 * Intersect a ray with any shape.
 */
export function intersectShape(
  shape: Shape,
  ray: Ray,
  minDistance: number
): Intersection | null {
  switch (shape.type) {
    case "sphere":
      return intersectSphere(shape, ray, minDistance);
    case "plane":
      return intersectPlane(shape, ray, minDistance);
    default: {
      const unknown: never = shape;
      throw new Error(`Unknown shape: ${JSON.stringify(unknown)}`);
    }
  }
}
