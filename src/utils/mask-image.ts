import sharp from 'sharp';
import type { CombinedMask } from '../types/results';

/**
 * PNG of a combined RGBA mask, at prototype resolution.
 */
export async function encodeMaskPng(mask: CombinedMask): Promise<Buffer> {
  return sharp(Buffer.from(mask.data.buffer, mask.data.byteOffset, mask.data.byteLength), {
    raw: { width: mask.width, height: mask.height, channels: 4 },
  })
    .png()
    .toBuffer();
}
