/**
 * Core type definitions for the renderer
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 3D Vector representation (immutable) */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Ray defined by origin and direction */
export interface Ray {
  readonly origin: Vector3;
  readonly direction: Vector3; // Not necessarily unit length
}

// =============================================================================
// SCENE TYPES
// =============================================================================

/** Surface reflectance properties of an object */
export interface Material {
  /** RGB albedo, conceptually in [0, 1] but not clamped */
  readonly colour: Vector3;
  readonly kAmbient: number;
  readonly kDiffuse: number;
  readonly kSpecular: number;
  /** Fraction of the mirror-reflected colour added to the local colour */
  readonly kReflect: number;
  /** Specular exponent */
  readonly shine: number;
}

export interface Sphere {
  readonly type: "sphere";
  readonly centre: Vector3;
  readonly radius: number;
}

export interface Plane {
  readonly type: "plane";
  readonly point: Vector3;
  readonly normal: Vector3; // Unit length
}

/** Geometric primitives, discriminated by `type` */
export type Shape = Sphere | Plane;

export type ShapeType = Shape["type"];

export interface SceneObject {
  readonly shape: Shape;
  readonly material: Material;
}

/** Point light, no attenuation by distance */
export interface LightSource {
  readonly colour: Vector3;
  readonly pos: Vector3;
}

export interface Camera {
  readonly position: Vector3;
  readonly direction: Vector3; // Normalized by the ray generator
  readonly screenDistance: number;
  readonly screenWidth: number;
  readonly screenHeight: number;
  readonly screenColumns: number;
  readonly screenRows: number;
}

export interface Scene {
  readonly camera: Camera;
  readonly ambientLight: Vector3;
  /** Colour returned by rays that hit nothing */
  readonly backgroundColour: Vector3;
  readonly lights: readonly LightSource[];
  readonly objects: readonly SceneObject[];
}

// =============================================================================
// TRACING TYPES
// =============================================================================

/** Ray-surface intersection (transient, one per ray cast) */
export interface Intersection {
  readonly t: number;
  readonly pos: Vector3;
  readonly normal: Vector3; // Unit length
}

/** Nearest intersection along a ray together with the material that was hit */
export interface SceneHit {
  readonly intersection: Intersection;
  readonly material: Material;
}

/** Tunable render settings */
export interface RenderOptions {
  /** Minimum distance for shadow rays */
  readonly shadowEpsilon: number;
  /** Minimum distance for reflection rays */
  readonly reflectionEpsilon: number;
  /** Maximum number of reflection bounces per primary ray */
  readonly maxBounces: number;
  /** World "up" used to build the camera basis */
  readonly worldUp: Vector3;
}

// =============================================================================
// OUTPUT TYPES
// =============================================================================

/** 8-bit per channel display colour */
export interface Rgb8 {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Row-major RGB raster, row 0 at the top */
export interface RenderedImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array; // width * height * RGB_CHANNELS bytes
}

/** Bytes per pixel in RenderedImage.data */
export const RGB_CHANNELS = 3;
