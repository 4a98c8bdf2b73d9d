import { writeFileSync } from "node:fs";
import { PNG } from "pngjs";
import { RGB_CHANNELS, type RenderedImage } from "@/types";

/**
 * Encode a rendered image as PNG bytes (RGBA, fully opaque).
 */
export function encodePng(image: RenderedImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });

  for (let i = 0; i < image.width * image.height; i++) {
    const src = i * RGB_CHANNELS;
    const dst = i * 4;
    png.data[dst] = image.data[src] ?? 0;
    png.data[dst + 1] = image.data[src + 1] ?? 0;
    png.data[dst + 2] = image.data[src + 2] ?? 0;
    png.data[dst + 3] = 255;
  }

  return PNG.sync.write(png);
}

/**
 * Encode and write a rendered image to disk.
 */
export function writePng(image: RenderedImage, path: string): void {
  writeFileSync(path, encodePng(image));
}
