import type { Vector3 } from "@/types";

/**
 * Vec3 - Pure utility functions for 3D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec3 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number, z: number): Vector3 {
    return { x, y, z };
  },

  /**
   * Return a zero vector
   */
  zero(): Vector3 {
    return { x: 0, y: 0, z: 0 };
  },

  add(a: Vector3, b: Vector3): Vector3 {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector3, b: Vector3): Vector3 {
    return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
  },

  scale(v: Vector3, scalar: number): Vector3 {
    return { x: v.x * scalar, y: v.y * scalar, z: v.z * scalar };
  },

  /**
   * Component-wise (Hadamard) product, used to filter light by surface colour
   */
  multiply(a: Vector3, b: Vector3): Vector3 {
    return { x: a.x * b.x, y: a.y * b.y, z: a.z * b.z };
  },

  dot(a: Vector3, b: Vector3): number {
    return a.x * b.x + a.y * b.y + a.z * b.z;
  },

  /**
   * Right-handed cross product a × b
   */
  cross(a: Vector3, b: Vector3): Vector3 {
    return {
      x: a.y * b.z - a.z * b.y,
      y: a.z * b.x - a.x * b.z,
      z: a.x * b.y - a.y * b.x,
    };
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector3): number {
    return v.x * v.x + v.y * v.y + v.z * v.z;
  },

  length(v: Vector3): number {
    return Math.sqrt(Vec3.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if input is zero vector
   */
  normalize(v: Vector3): Vector3 {
    const len = Vec3.length(v);
    if (len === 0) return { x: 0, y: 0, z: 0 };
    return { x: v.x / len, y: v.y / len, z: v.z / len };
  },

  /**
   * Get normalized direction vector from point a to point b
   */
  direction(from: Vector3, to: Vector3): Vector3 {
    return Vec3.normalize(Vec3.subtract(to, from));
  },

  /**
   * Sum a list of vectors (zero for an empty list)
   */
  sum(vectors: readonly Vector3[]): Vector3 {
    return vectors.reduce<Vector3>((acc, v) => Vec3.add(acc, v), Vec3.zero());
  },

  /**
   * Mirror a direction about a surface normal.
   * Uses formula: r = d - 2(d · n)n
   *
   * The direction keeps its length; intersection tests account for |d|.
   *
   * @param direction - The incident direction
   * @param normal - The surface normal (must be unit length)
   */
  reflect(direction: Vector3, normal: Vector3): Vector3 {
    const dotProduct = Vec3.dot(direction, normal);
    return Vec3.subtract(direction, Vec3.scale(normal, 2 * dotProduct));
  },

  isZero(v: Vector3): boolean {
    return v.x === 0 && v.y === 0 && v.z === 0;
  },

  isFinite(v: Vector3): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
  },
};
