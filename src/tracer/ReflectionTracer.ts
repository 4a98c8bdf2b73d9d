/**
 * ReflectionTracer - Recursive entry point of the tracing pipeline.
 *
 * trace(ray) = background                          if nothing is hit
 *            = local + kReflect · trace(reflected) otherwise
 *
 * The bounce count is threaded through every call. Once it reaches
 * options.maxBounces the reflected contribution is zero, which also ends
 * the recursion between facing mirrors.
 */

import { RayUtils } from "@/math/Ray";
import { Vec3 } from "@/math/Vec3";
import type { Ray, RenderOptions, Scene, Vector3 } from "@/types";
import { findNearestHit } from "./IntersectionEngine";
import { shade } from "./ShadingEngine";

/**
 * Compute the colour seen along a ray.
 *
 * @param scene The scene being rendered
 * @param ray The ray to follow
 * @param minDistance Hits at or below this distance are ignored (0 for primary rays)
 * @param depth Number of reflections already performed for this primary ray
 * @param options Render options (epsilons, bounce ceiling)
 */
export function trace(
  scene: Scene,
  ray: Ray,
  minDistance: number,
  depth: number,
  options: RenderOptions
): Vector3 {
  const hit = findNearestHit(scene.objects, ray, minDistance);
  if (!hit) {
    return scene.backgroundColour;
  }

  const local = shade(scene, hit, ray, options);

  const { kReflect } = hit.material;
  if (kReflect === 0 || depth >= options.maxBounces) {
    return local;
  }

  const reflectedRay = RayUtils.create(
    hit.intersection.pos,
    Vec3.reflect(ray.direction, hit.intersection.normal)
  );
  const reflected = trace(scene, reflectedRay, options.reflectionEpsilon, depth + 1, options);

  return Vec3.add(local, Vec3.scale(reflected, kReflect));
}
