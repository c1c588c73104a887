export type CoordinateSpace = 'normalized' | 'pixel';

export interface Point {
  x: number;
  y: number;
}

export interface AxisBox {
  readonly kind: 'axis';
  readonly space: CoordinateSpace;
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/**
 * Rotated rectangle. `angle` is in radians, positive turns clockwise in image
 * coordinates (y pointing down).
 */
export interface OrientedBox {
  readonly kind: 'oriented';
  readonly space: CoordinateSpace;
  readonly centerX: number;
  readonly centerY: number;
  readonly width: number;
  readonly height: number;
  readonly angle: number;
}

export type Box = AxisBox | OrientedBox;

export interface Keypoint {
  readonly x: number;
  readonly y: number;
  readonly confidence: number;
}

/** Ordered keypoints; the index carries the skeleton semantics (COCO order for 17 points). */
export interface KeypointSet {
  readonly space: CoordinateSpace;
  readonly points: readonly Keypoint[];
}

export function axisBox(
  space: CoordinateSpace,
  left: number,
  top: number,
  right: number,
  bottom: number,
): AxisBox {
  return Object.freeze({ kind: 'axis', space, left, top, right, bottom });
}

export function orientedBox(
  space: CoordinateSpace,
  centerX: number,
  centerY: number,
  width: number,
  height: number,
  angle: number,
): OrientedBox {
  return Object.freeze({ kind: 'oriented', space, centerX, centerY, width, height, angle });
}
