/**
 * ShadingEngine - Local illumination at a hit point.
 *
 * colour = ambient + Σ over unoccluded lights (diffuse + specular)
 *
 *   ambient  = kAmbient · (ambientLight ⊙ colour)
 *   diffuse  = kDiffuse · clamp(n·l, 0, 1) · (light ⊙ colour)
 *   specular = kSpecular · clamp(h·n, 0, 1)^shine · light
 *
 * where l points from the hit toward the light, v from the hit toward the
 * ray origin, and h = normalize(l + v). Shadows are binary: any object hit
 * by the shadow ray removes that light's whole contribution, even when the
 * occluder lies beyond the light.
 *
 * The result is linear RGB and is not clamped.
 */

import { RayUtils } from "@/math/Ray";
import { Vec3 } from "@/math/Vec3";
import type {
  Intersection,
  LightSource,
  Material,
  Ray,
  RenderOptions,
  Scene,
  SceneHit,
  Vector3,
} from "@/types";
import { hitsAnything } from "./IntersectionEngine";

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Ambient term for a material under the scene's global ambient light.
 */
export function ambientTerm(scene: Scene, material: Material): Vector3 {
  return Vec3.scale(Vec3.multiply(scene.ambientLight, material.colour), material.kAmbient);
}

/**
 * Whether the segment from a surface point toward a light is blocked.
 */
export function isOccluded(
  scene: Scene,
  point: Vector3,
  light: LightSource,
  options: RenderOptions
): boolean {
  const shadowRay = RayUtils.towards(point, light.pos);
  return hitsAnything(scene.objects, shadowRay, options.shadowEpsilon);
}

/**
 * Diffuse plus specular contribution of one (unoccluded) light.
 *
 * @param viewDirection Unit vector from the hit point toward the viewer
 */
export function lightContribution(
  intersection: Intersection,
  material: Material,
  light: LightSource,
  viewDirection: Vector3
): Vector3 {
  const lightDirection = Vec3.direction(intersection.pos, light.pos);

  const lambert = clamp01(Vec3.dot(intersection.normal, lightDirection));
  const diffuse = Vec3.scale(Vec3.multiply(light.colour, material.colour), material.kDiffuse * lambert);

  // Opposite light and view directions give a zero half vector, hence a zero highlight
  const halfVector = Vec3.normalize(Vec3.add(lightDirection, viewDirection));
  const highlight = Math.pow(clamp01(Vec3.dot(halfVector, intersection.normal)), material.shine);
  const specular = Vec3.scale(light.colour, material.kSpecular * highlight);

  return Vec3.add(diffuse, specular);
}

/**
 * Local (non-reflective) colour of a hit.
 *
 * @param scene The scene being rendered
 * @param hit Nearest hit and its material
 * @param ray The ray that produced the hit; its origin is the viewer
 * @param options Render options (shadow epsilon)
 */
export function shade(scene: Scene, hit: SceneHit, ray: Ray, options: RenderOptions): Vector3 {
  const { intersection, material } = hit;
  const viewDirection = Vec3.direction(intersection.pos, ray.origin);

  const lit = scene.lights
    .filter((light) => !isOccluded(scene, intersection.pos, light, options))
    .map((light) => lightContribution(intersection, material, light, viewDirection));

  return Vec3.add(ambientTerm(scene, material), Vec3.sum(lit));
}
