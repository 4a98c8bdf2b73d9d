/**
 * IntersectionEngine - Nearest-hit resolution over all scene objects.
 *
 * Linear scan: every object is tested, the smallest qualifying t wins.
 * On exactly equal t the earlier object in scene order is kept.
 */

import { intersectShape } from "@/geometry/ShapeIntersection";
import type { Ray, SceneHit, SceneObject } from "@/types";

/**
 * Find the nearest object hit by a ray.
 *
 * @param objects Objects to test, in scene order
 * @param ray The ray to cast
 * @param minDistance Hits at or below this distance are ignored (0 for primary rays)
 * @returns The nearest hit with its material, or null if nothing qualifies
 */
export function findNearestHit(
  objects: readonly SceneObject[],
  ray: Ray,
  minDistance: number
): SceneHit | null {
  let nearest: SceneHit | null = null;

  for (const object of objects) {
    const intersection = intersectShape(object.shape, ray, minDistance);
    if (!intersection) continue;

    if (nearest === null || intersection.t < nearest.intersection.t) {
      nearest = { intersection, material: object.material };
    }
  }

  return nearest;
}

/**
 * Whether anything at all is hit beyond minDistance.
 * Stops at the first hit; used by shadow rays, which only need a yes/no.
 */
export function hitsAnything(
  objects: readonly SceneObject[],
  ray: Ray,
  minDistance: number
): boolean {
  return objects.some((object) => intersectShape(object.shape, ray, minDistance) !== null);
}
