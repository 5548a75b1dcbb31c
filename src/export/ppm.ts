// ABOUTME: Writes rendered frames to disk as binary PPM (P6) images
// ABOUTME: The pixel buffer is already RGB, top row first, which is exactly the P6 payload

import { writeFile } from "node:fs/promises";

import type { PixelBuffer } from "../fractals/types";

export interface ImageExporter {
  exportImage(buffer: PixelBuffer, destination: string): Promise<void>;
}

/**
 * Header plus payload of a P6 image with a max channel value of 255.
 */
export function encodePpm(buffer: PixelBuffer): Uint8Array {
  const { width, height, bytes } = buffer;
  if (bytes.length !== width * height * 3) {
    throw new Error(`Pixel buffer holds ${bytes.length} bytes, expected ${width * height * 3} for ${width}x${height}`);
  }

  const header = new TextEncoder().encode(`P6\n${width} ${height}\n255\n`);
  const image = new Uint8Array(header.length + bytes.length);
  image.set(header, 0);
  image.set(bytes, header.length);
  return image;
}

export class PpmExporter implements ImageExporter {
  async exportImage(buffer: PixelBuffer, destination: string): Promise<void> {
    await writeFile(destination, encodePpm(buffer));
    console.log(`Saved ${buffer.width}x${buffer.height} image to ${destination}`);
  }
}
