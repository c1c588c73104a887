import type { Rgba } from '../types';

// Mask and box colors, alpha 153 (~60%)
export const CLASS_PALETTE: readonly Rgba[] = Object.freeze([
  [4, 42, 255, 153],
  [11, 219, 235, 153],
  [243, 243, 243, 153],
  [0, 223, 183, 153],
  [17, 31, 104, 153],
  [255, 111, 221, 153],
  [255, 68, 79, 153],
  [204, 237, 0, 153],
  [0, 243, 68, 153],
  [189, 0, 255, 153],
  [0, 180, 255, 153],
  [221, 0, 186, 153],
  [0, 255, 255, 153],
  [38, 192, 0, 153],
  [1, 255, 179, 153],
  [125, 36, 255, 153],
  [123, 0, 104, 153],
  [255, 27, 108, 153],
  [252, 109, 47, 153],
  [162, 255, 11, 153],
] as const);

export const POSE_PALETTE: readonly Rgba[] = Object.freeze([
  [255, 128, 0, 255],
  [255, 153, 51, 255],
  [255, 178, 102, 255],
  [230, 230, 0, 255],
  [255, 153, 255, 255],
  [153, 204, 255, 255],
  [255, 102, 255, 255],
  [255, 51, 255, 255],
  [102, 178, 255, 255],
  [51, 153, 255, 255],
  [255, 153, 153, 255],
  [255, 102, 102, 255],
  [255, 51, 51, 255],
  [153, 255, 153, 255],
  [102, 255, 102, 255],
  [51, 255, 51, 255],
  [0, 255, 0, 255],
  [0, 0, 255, 255],
  [255, 0, 0, 255],
  [255, 255, 255, 255],
] as const);

/** COCO-17 limb pairs, zero-based keypoint indices */
export const COCO_SKELETON: readonly (readonly [number, number])[] = Object.freeze([
  [15, 13],
  [13, 11],
  [16, 14],
  [14, 12],
  [11, 12],
  [5, 11],
  [6, 12],
  [5, 6],
  [5, 7],
  [6, 8],
  [7, 9],
  [8, 10],
  [1, 2],
  [0, 1],
  [0, 2],
  [1, 3],
  [2, 4],
  [3, 5],
  [4, 6],
] as const);

export const KEYPOINT_COLOR_INDICES: readonly number[] = Object.freeze([
  16, 16, 16, 16, 16, 9, 9, 9, 9, 9, 9, 0, 0, 0, 0, 0, 0,
]);

export const LIMB_COLOR_INDICES: readonly number[] = Object.freeze([
  0, 0, 0, 0, 7, 7, 7, 9, 9, 9, 9, 9, 16, 16, 16, 16, 16, 16, 16,
]);

export function classColor(classIndex: number, palette: readonly Rgba[] = CLASS_PALETTE): Rgba {
  const n = palette.length;
  return palette[((classIndex % n) + n) % n];
}
