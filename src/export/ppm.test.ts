import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { PixelBuffer } from "../fractals/types";
import { encodePpm, PpmExporter } from "./ppm";

const redThenBlue: PixelBuffer = {
  width: 2,
  height: 1,
  bytes: new Uint8Array([255, 0, 0, 0, 0, 255]),
};

describe("encodePpm", () => {
  it("should write the P6 header followed by the RGB payload", () => {
    const image = encodePpm(redThenBlue);

    expect(image.length).toBe(11 + 6);
    expect(new TextDecoder().decode(image.slice(0, 11))).toBe("P6\n2 1\n255\n");
    expect(Array.from(image.slice(11))).toEqual([255, 0, 0, 0, 0, 255]);
  });

  it("should reject a buffer whose size does not match its dimensions", () => {
    expect(() => encodePpm({ width: 2, height: 2, bytes: new Uint8Array(6) })).toThrow(
      "Pixel buffer holds 6 bytes, expected 12 for 2x2"
    );
  });
});

describe("PpmExporter", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "ppm-export-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it("should write the encoded image to the destination", async () => {
    const destination = path.join(directory, "frame.ppm");

    await new PpmExporter().exportImage(redThenBlue, destination);

    const written = await readFile(destination);
    expect(Array.from(written)).toEqual(Array.from(encodePpm(redThenBlue)));
  });
});
