import type { Ray, Vector3 } from "@/types";
import { Vec3 } from "./Vec3";

/**
 * RayUtils - Pure utility functions for ray operations
 */
export const RayUtils = {
  /**
   * Create a ray from origin and direction
   * @param origin - Start point of ray
   * @param direction - Direction vector (kept as given, not normalized)
   */
  create(origin: Vector3, direction: Vector3): Ray {
    return { origin, direction };
  },

  /**
   * Create a ray from origin with a unit direction towards a target point
   */
  towards(origin: Vector3, target: Vector3): Ray {
    return { origin, direction: Vec3.direction(origin, target) };
  },

  /**
   * Get point along ray at parameter t
   * P(t) = origin + t * direction
   */
  pointAt(ray: Ray, t: number): Vector3 {
    return Vec3.add(ray.origin, Vec3.scale(ray.direction, t));
  },
};
