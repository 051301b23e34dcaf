/**
 * Image normalization: decode, validate, resize and re-encode one page image.
 * Pure with respect to the filesystem.
 */

import sharp from "sharp";
import { DecodeError, InvalidDimensions, errorMessage } from "./errors.js";
import type { NormalizedImage } from "./types.js";

/** Width every page is scaled to, before the limits below apply */
export const PREFERRED_WIDTH = 1600;

/** Largest dimension a PDF page image may have */
export const MAX_DIMENSION = 65500;

/** Smallest dimension (4 points at 72 DPI) */
export const MIN_DIMENSION = 4;

export const JPEG_QUALITY = 90;

export const OUTPUT_DPI = 72;

const WHITE = { r: 255, g: 255, b: 255 };

function clamp(value: number): number {
  return Math.max(Math.min(value, MAX_DIMENSION), MIN_DIMENSION);
}

/**
 * Compute output dimensions for a source image.
 *
 * Scales to {@link PREFERRED_WIDTH}, then corrects for height, then for
 * width, then clamps to the floor. The order matters for extreme aspect
 * ratios and must not change.
 *
 * @throws {InvalidDimensions} If either source dimension is zero
 */
export function computeTargetSize(sourceWidth: number, sourceHeight: number): { width: number; height: number } {
  if (sourceWidth <= 0 || sourceHeight <= 0) {
    throw new InvalidDimensions(sourceWidth, sourceHeight);
  }

  let width = PREFERRED_WIDTH;
  let height = Math.floor((sourceHeight * PREFERRED_WIDTH) / sourceWidth);

  if (height > MAX_DIMENSION) {
    width = Math.floor((sourceWidth * MAX_DIMENSION) / sourceHeight);
    height = MAX_DIMENSION;
  }

  if (width > MAX_DIMENSION) {
    width = MAX_DIMENSION;
    height = Math.floor((sourceHeight * MAX_DIMENSION) / sourceWidth);
  }

  return { width: clamp(width), height: clamp(height) };
}

/**
 * Normalize raw image bytes into a JPEG page.
 * Transparency is flattened onto white and palettes are expanded, so the
 * output is always three-channel sRGB.
 *
 * @param raw - Bytes as fetched from the network
 * @throws {DecodeError} If the bytes are not a valid image
 * @throws {InvalidDimensions} If the image reports a zero dimension
 */
export async function normalize(raw: Buffer): Promise<NormalizedImage> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(raw).metadata();
  } catch (error) {
    throw new DecodeError(`Unreadable image: ${errorMessage(error)}`, { cause: error });
  }

  const target = computeTargetSize(metadata.width ?? 0, metadata.height ?? 0);

  try {
    const { data, info } = await sharp(raw)
      .flatten({ background: WHITE })
      .toColourspace("srgb")
      .resize(target.width, target.height, { fit: "fill", kernel: sharp.kernel.lanczos3 })
      .jpeg({ quality: JPEG_QUALITY })
      .withMetadata({ density: OUTPUT_DPI })
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height };
  } catch (error) {
    throw new DecodeError(`Failed to decode image: ${errorMessage(error)}`, { cause: error });
  }
}
