import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { DecodeError, InvalidDimensions } from "./errors.js";
import { MAX_DIMENSION, MIN_DIMENSION, computeTargetSize, normalize } from "./normalize.js";
import { solidPng } from "./testing/images.js";

describe("computeTargetSize", () => {
  it("scales to the preferred width keeping the aspect ratio", () => {
    expect(computeTargetSize(800, 1200)).toEqual({ width: 1600, height: 2400 });
    expect(computeTargetSize(3200, 1000)).toEqual({ width: 1600, height: 500 });
  });

  it("truncates fractional heights", () => {
    expect(computeTargetSize(3, 1)).toEqual({ width: 1600, height: 533 });
  });

  it("limits very tall images by height first", () => {
    // 1600 * 50 = 80000 exceeds the limit, so width follows from 65500
    expect(computeTargetSize(1000, 50000)).toEqual({ width: 1310, height: 65500 });
  });

  it("keeps the aspect ratio of tall strips within rounding", () => {
    const { width, height } = computeTargetSize(700, 70000);
    expect(height).toBe(MAX_DIMENSION);
    expect(width).toBe(655);
    expect(Math.abs(width / height - 700 / 70000)).toBeLessThan(1 / height + 1 / width);
  });

  it("keeps wide panoramas at the preferred width", () => {
    expect(computeTargetSize(50000, 1000)).toEqual({ width: 1600, height: 32 });
  });

  it("applies the floor to both dimensions", () => {
    expect(computeTargetSize(100000, 100)).toEqual({ width: 1600, height: MIN_DIMENSION });
    expect(computeTargetSize(100, 10000000)).toEqual({ width: MIN_DIMENSION, height: MAX_DIMENSION });
  });

  it("always stays within bounds for extreme ratios", () => {
    const pairs: Array<[number, number]> = [
      [1, 65501],
      [65501, 1],
      [2, 1000000],
      [1000000, 2],
      [1600, 65500],
    ];
    for (const [w, h] of pairs) {
      const size = computeTargetSize(w, h);
      expect(size.width).toBeGreaterThanOrEqual(MIN_DIMENSION);
      expect(size.height).toBeGreaterThanOrEqual(MIN_DIMENSION);
      expect(size.width).toBeLessThanOrEqual(MAX_DIMENSION);
      expect(size.height).toBeLessThanOrEqual(MAX_DIMENSION);
    }
  });

  it("rejects zero dimensions", () => {
    expect(() => computeTargetSize(0, 100)).toThrow(InvalidDimensions);
    expect(() => computeTargetSize(100, 0)).toThrow(InvalidDimensions);
  });
});

describe("normalize", () => {
  it("re-encodes as a 72 DPI JPEG at the target size", async () => {
    const result = await normalize(await solidPng(80, 120));

    expect(result.width).toBe(1600);
    expect(result.height).toBe(2400);

    const meta = await sharp(result.data).metadata();
    expect(meta.format).toBe("jpeg");
    expect(meta.width).toBe(1600);
    expect(meta.height).toBe(2400);
    expect(meta.density).toBe(72);
  });

  it("drops transparency", async () => {
    const result = await normalize(await solidPng(40, 20, { alpha: true }));

    const meta = await sharp(result.data).metadata();
    expect(meta.channels).toBe(3);
    expect(meta.hasAlpha).toBe(false);
    expect(result.height).toBe(800);
  });

  it("expands palette images", async () => {
    const result = await normalize(await solidPng(16, 16, { palette: true }));

    const meta = await sharp(result.data).metadata();
    expect(meta.channels).toBe(3);
    expect(meta.space).toBe("srgb");
  });

  it("rejects bytes that are not an image", async () => {
    await expect(normalize(Buffer.from("<html>not found</html>"))).rejects.toBeInstanceOf(DecodeError);
  });
});
