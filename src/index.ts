/**
 * Public exports
 */
export * from "./types";
export { Vec3 } from "./math/Vec3";
export { RayUtils } from "./math/Ray";
export { DEFAULT_RENDER_OPTIONS, createRenderOptions } from "./config/renderConfig";
export { intersectShape, intersectSphere, intersectPlane } from "./geometry/ShapeIntersection";
export { findNearestHit } from "./tracer/IntersectionEngine";
export { shade } from "./tracer/ShadingEngine";
export { trace } from "./tracer/ReflectionTracer";
export {
  createCameraRayGenerator,
  computeCameraBasis,
  type CameraBasis,
  type CameraRayGenerator,
} from "./camera/CameraRayGenerator";
export {
  renderScene,
  renderRows,
  renderPixel,
  getPixel,
  toDisplayChannel,
  toDisplayColour,
} from "./render/PixelRenderer";
export { parseScene, parseSceneJson, loadSceneFile } from "./scene/SceneLoader";
export { encodePng, writePng } from "./image/PngWriter";
export { RenderDebugLogger } from "./debug/RenderDebugLogger";
