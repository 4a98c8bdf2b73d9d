/**
 * PixelRenderer - Drives the tracer over the pixel grid.
 *
 * Every pixel is an independent function of (x, y, scene, options). Rows are
 * rendered into their own byte bands and copied into the image afterwards,
 * so the row split can be scheduled in any order with identical output.
 */

import {
  createCameraRayGenerator,
  type CameraRayGenerator,
} from "@/camera/CameraRayGenerator";
import { createRenderOptions } from "@/config/renderConfig";
import { RenderDebugLogger } from "@/debug/RenderDebugLogger";
import { trace } from "@/tracer/ReflectionTracer";
import {
  RGB_CHANNELS,
  type RenderedImage,
  type RenderOptions,
  type Rgb8,
  type Scene,
  type Vector3,
} from "@/types";

/**
 * Convert a linear channel value to an 8-bit display value.
 * NaN maps to 0; infinities clamp like any other out-of-range value.
 */
export function toDisplayChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(255, Math.max(0, Math.round(value * 255)));
}

export function toDisplayColour(colour: Vector3): Rgb8 {
  return {
    r: toDisplayChannel(colour.x),
    g: toDisplayChannel(colour.y),
    b: toDisplayChannel(colour.z),
  };
}

/**
 * Linear colour of a single pixel.
 */
export function renderPixel(
  scene: Scene,
  generator: CameraRayGenerator,
  x: number,
  y: number,
  options: RenderOptions
): Vector3 {
  return trace(scene, generator.rayForPixel(x, y), 0, 0, options);
}

/**
 * Render the rows [startRow, endRow) into a standalone RGB band.
 */
export function renderRows(
  scene: Scene,
  startRow: number,
  endRow: number,
  options: RenderOptions,
  generator: CameraRayGenerator = createCameraRayGenerator(scene.camera, options.worldUp)
): Uint8Array {
  const columns = scene.camera.screenColumns;
  const first = Math.max(0, startRow);
  const last = Math.min(scene.camera.screenRows, endRow);
  const band = new Uint8Array(Math.max(0, last - first) * columns * RGB_CHANNELS);

  for (let y = first; y < last; y++) {
    for (let x = 0; x < columns; x++) {
      const { r, g, b } = toDisplayColour(renderPixel(scene, generator, x, y, options));
      const offset = ((y - first) * columns + x) * RGB_CHANNELS;
      band[offset] = r;
      band[offset + 1] = g;
      band[offset + 2] = b;
    }
  }

  return band;
}

/**
 * Render the whole scene at the camera's resolution.
 *
 * @param scene The scene to render (not modified)
 * @param options Overrides for DEFAULT_RENDER_OPTIONS
 */
export function renderScene(scene: Scene, options: Partial<RenderOptions> = {}): RenderedImage {
  const opts = createRenderOptions(options);
  RenderDebugLogger.logScene(scene, opts);
  const startTime = performance.now();

  const generator = createCameraRayGenerator(scene.camera, opts.worldUp);
  const width = scene.camera.screenColumns;
  const height = scene.camera.screenRows;
  const rowBytes = width * RGB_CHANNELS;

  const data = new Uint8Array(height * rowBytes);
  for (let y = 0; y < height; y++) {
    data.set(renderRows(scene, y, y + 1, opts, generator), y * rowBytes);
  }

  const image: RenderedImage = { width, height, data };
  RenderDebugLogger.logRender(image, performance.now() - startTime);
  return image;
}

/**
 * Read back the display colour of a pixel.
 */
export function getPixel(image: RenderedImage, x: number, y: number): Rgb8 {
  if (x < 0 || x >= image.width || y < 0 || y >= image.height) {
    throw new Error(`Pixel (${x}, ${y}) out of bounds [${image.width}x${image.height}]`);
  }
  const offset = (y * image.width + x) * RGB_CHANNELS;
  return {
    r: image.data[offset] ?? 0,
    g: image.data[offset + 1] ?? 0,
    b: image.data[offset + 2] ?? 0,
  };
}
