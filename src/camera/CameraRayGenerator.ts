/**
 * CameraRayGenerator - Maps pixel coordinates to primary rays.
 *
 * Basis:
 *   u = normalize(direction)  (forward)
 *   v = u × worldUp           (screen right)
 *   w = v × u                 (screen up)
 *
 * Pixel (x, y) lands at offsets measured from the middle of the grid; y is
 * inverted so that row 0 is the top of the image. Ray directions are not
 * normalized.
 */

import { RayUtils } from "@/math/Ray";
import { Vec3 } from "@/math/Vec3";
import type { Camera, Ray, Vector3 } from "@/types";

export interface CameraBasis {
  readonly u: Vector3;
  readonly v: Vector3;
  readonly w: Vector3;
}

export interface CameraRayGenerator {
  /** The basis the generator was built with */
  readonly basis: CameraBasis;

  /**
   * Primary ray through pixel (x, y). Pure: same input, same ray.
   */
  rayForPixel(x: number, y: number): Ray;
}

/**
 * Build the camera basis.
 * Throws when the view direction is zero or parallel to worldUp, since the
 * cross product then has no direction to give the screen axes.
 */
export function computeCameraBasis(direction: Vector3, worldUp: Vector3): CameraBasis {
  const u = Vec3.normalize(direction);
  if (Vec3.isZero(u)) {
    throw new Error("Camera direction must be a non-zero vector");
  }

  const v = Vec3.cross(u, worldUp);
  if (Vec3.isZero(v)) {
    throw new Error(
      `Camera direction (${direction.x}, ${direction.y}, ${direction.z}) is parallel to world up ` +
        `(${worldUp.x}, ${worldUp.y}, ${worldUp.z}); choose another up vector`
    );
  }

  const w = Vec3.cross(v, u);
  return { u, v, w };
}

/**
 * Create a ray generator for a camera.
 *
 * @param camera Camera position, view direction and screen geometry
 * @param worldUp World "up" used for the basis
 */
export function createCameraRayGenerator(camera: Camera, worldUp: Vector3): CameraRayGenerator {
  const basis = computeCameraBasis(camera.direction, worldUp);
  const forward = Vec3.scale(basis.u, camera.screenDistance);
  const centreColumn = Math.floor(camera.screenColumns / 2);
  const centreRow = Math.floor(camera.screenRows / 2);

  function rayForPixel(x: number, y: number): Ray {
    const xScreen = ((x - centreColumn) / camera.screenColumns) * camera.screenWidth * 0.5;
    const yScreen = ((y - centreRow) / camera.screenRows) * camera.screenHeight * -0.5;

    const direction = Vec3.add(
      forward,
      Vec3.add(Vec3.scale(basis.v, xScreen), Vec3.scale(basis.w, yScreen))
    );
    return RayUtils.create(camera.position, direction);
  }

  return { basis, rayForPixel };
}
