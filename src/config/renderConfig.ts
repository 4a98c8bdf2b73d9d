import { Vec3 } from "@/math/Vec3";
import type { RenderOptions } from "@/types";

/**
 * Default render options
 */
export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  /**
   * Shadow rays start exactly on a surface. Hits closer than this are
   * treated as the surface itself (acne) and ignored.
   */
  shadowEpsilon: 0.1,
  reflectionEpsilon: 1e-4,
  maxBounces: 10,
  worldUp: { x: 0, y: 0, z: 1 },
};

/**
 * Creates the render options from partial overrides
 * Undefined overrides keep the default; throws if an override is out of range
 */
export function createRenderOptions(options: Partial<RenderOptions> = {}): RenderOptions {
  const opts: RenderOptions = {
    shadowEpsilon: options.shadowEpsilon ?? DEFAULT_RENDER_OPTIONS.shadowEpsilon,
    reflectionEpsilon: options.reflectionEpsilon ?? DEFAULT_RENDER_OPTIONS.reflectionEpsilon,
    maxBounces: options.maxBounces ?? DEFAULT_RENDER_OPTIONS.maxBounces,
    worldUp: options.worldUp ?? DEFAULT_RENDER_OPTIONS.worldUp,
  };

  if (!Number.isInteger(opts.maxBounces) || opts.maxBounces < 0) {
    throw new Error(`maxBounces must be a non-negative integer, got ${opts.maxBounces}`);
  }
  if (!Number.isFinite(opts.shadowEpsilon) || opts.shadowEpsilon < 0) {
    throw new Error(`shadowEpsilon must be a non-negative number, got ${opts.shadowEpsilon}`);
  }
  if (!Number.isFinite(opts.reflectionEpsilon) || opts.reflectionEpsilon < 0) {
    throw new Error(`reflectionEpsilon must be a non-negative number, got ${opts.reflectionEpsilon}`);
  }
  if (!Vec3.isFinite(opts.worldUp) || Vec3.isZero(opts.worldUp)) {
    throw new Error("worldUp must be a finite, non-zero vector");
  }

  return opts;
}
