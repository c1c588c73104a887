import type { FrameInfo, Rotation } from '../types';
import type { AxisBox, KeypointSet, OrientedBox, Point } from '../types/geometry';
import { axisBox, orientedBox } from '../types/geometry';
import { CoordinateSpaceError } from './errors';

const DEG_TO_RAD = Math.PI / 180;

function expectSpace(actual: string, expected: 'normalized' | 'pixel'): void {
  if (actual !== expected) {
    throw new CoordinateSpaceError(expected, actual);
  }
}

/**
 * Undo a clockwise frame rotation on a normalized point. A point (x, y) of the
 * original frame lands on (1 - y, x) after a 90° turn, so this maps (u, v) back
 * to (v, 1 - u).
 */
export function unrotatePoint(point: Point, rotation: Rotation): Point {
  switch (rotation) {
    case 0:
      return { x: point.x, y: point.y };
    case 90:
      return { x: point.y, y: 1 - point.x };
    case 180:
      return { x: 1 - point.x, y: 1 - point.y };
    case 270:
      return { x: 1 - point.y, y: point.x };
  }
}

/** Inverse of `unrotatePoint` */
export function rotatePoint(point: Point, rotation: Rotation): Point {
  switch (rotation) {
    case 0:
      return { x: point.x, y: point.y };
    case 90:
      return { x: 1 - point.y, y: point.x };
    case 180:
      return { x: 1 - point.x, y: 1 - point.y };
    case 270:
      return { x: point.y, y: 1 - point.x };
  }
}

function cornersToBox(a: Point, b: Point): AxisBox {
  return axisBox(
    'normalized',
    Math.min(a.x, b.x),
    Math.min(a.y, b.y),
    Math.max(a.x, b.x),
    Math.max(a.y, b.y),
  );
}

export function unrotateBox(box: AxisBox, rotation: Rotation): AxisBox {
  expectSpace(box.space, 'normalized');
  if (rotation === 0) return box;
  return cornersToBox(
    unrotatePoint({ x: box.left, y: box.top }, rotation),
    unrotatePoint({ x: box.right, y: box.bottom }, rotation),
  );
}

/**
 * Rotates the center back and removes the frame rotation from the angle.
 * Width and height stay along the box's own axes.
 */
export function unrotateOrientedBox(box: OrientedBox, rotation: Rotation): OrientedBox {
  expectSpace(box.space, 'normalized');
  if (rotation === 0) return box;
  const center = unrotatePoint({ x: box.centerX, y: box.centerY }, rotation);
  return orientedBox('normalized', center.x, center.y, box.width, box.height, box.angle - rotation * DEG_TO_RAD);
}

export function toPixelPoint(point: Point, frame: FrameInfo): Point {
  const p = unrotatePoint(point, frame.rotation);
  return { x: p.x * frame.originalWidth, y: p.y * frame.originalHeight };
}

/** Normalized model-input box → original image pixels */
export function toPixelBox(box: AxisBox, frame: FrameInfo): AxisBox {
  const n = unrotateBox(box, frame.rotation);
  return axisBox(
    'pixel',
    n.left * frame.originalWidth,
    n.top * frame.originalHeight,
    n.right * frame.originalWidth,
    n.bottom * frame.originalHeight,
  );
}

/**
 * Original image pixels → normalized model-input box. Inverse of `toPixelBox`.
 */
export function toNormalizedBox(box: AxisBox, frame: FrameInfo): AxisBox {
  expectSpace(box.space, 'pixel');
  const topLeft = { x: box.left / frame.originalWidth, y: box.top / frame.originalHeight };
  const bottomRight = { x: box.right / frame.originalWidth, y: box.bottom / frame.originalHeight };
  return cornersToBox(rotatePoint(topLeft, frame.rotation), rotatePoint(bottomRight, frame.rotation));
}

/**
 * Width and height stay normalized to the rotated frame they were measured
 * in, so a quarter turn scales them by the original height and width.
 */
export function toPixelOrientedBox(box: OrientedBox, frame: FrameInfo): OrientedBox {
  const n = unrotateOrientedBox(box, frame.rotation);
  const quarterTurn = frame.rotation === 90 || frame.rotation === 270;
  const widthScale = quarterTurn ? frame.originalHeight : frame.originalWidth;
  const heightScale = quarterTurn ? frame.originalWidth : frame.originalHeight;
  return orientedBox(
    'pixel',
    n.centerX * frame.originalWidth,
    n.centerY * frame.originalHeight,
    n.width * widthScale,
    n.height * heightScale,
    n.angle,
  );
}

export function toPixelKeypoints(set: KeypointSet, frame: FrameInfo): KeypointSet {
  expectSpace(set.space, 'normalized');
  return Object.freeze({
    space: 'pixel',
    points: Object.freeze(
      set.points.map((kp) => {
        const { x, y } = toPixelPoint(kp, frame);
        return Object.freeze({ x, y, confidence: kp.confidence });
      }),
    ),
  });
}

/** Keypoints in normalized coordinates of the original (unrotated) frame */
export function unrotateKeypoints(set: KeypointSet, rotation: Rotation): KeypointSet {
  expectSpace(set.space, 'normalized');
  return Object.freeze({
    space: 'normalized',
    points: Object.freeze(
      set.points.map((kp) => {
        const { x, y } = unrotatePoint(kp, rotation);
        return Object.freeze({ x, y, confidence: kp.confidence });
      }),
    ),
  });
}
