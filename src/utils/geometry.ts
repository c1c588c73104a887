import type { AxisBox, Box, OrientedBox, Point } from '../types/geometry';
import { axisBox, orientedBox } from '../types/geometry';
import { CoordinateSpaceError } from './errors';

// Below this the clip line and the subject edge are treated as parallel
const PARALLEL_EPSILON = 1e-7;

/**
 * Calculate IoU (Intersection over Union) between two axis-aligned boxes
 */
export function axisIoU(a: AxisBox, b: AxisBox): number {
  if (a.space !== b.space) {
    throw new CoordinateSpaceError(a.space, b.space);
  }
  const interLeft = Math.max(a.left, b.left);
  const interTop = Math.max(a.top, b.top);
  const interRight = Math.min(a.right, b.right);
  const interBottom = Math.min(a.bottom, b.bottom);
  const interArea = Math.max(0, interRight - interLeft) * Math.max(0, interBottom - interTop);

  const unionArea =
    (a.right - a.left) * (a.bottom - a.top) + (b.right - b.left) * (b.bottom - b.top) - interArea;

  return unionArea > 0 ? interArea / unionArea : 0;
}

/**
 * Corners of an oriented box: top-left, top-right, bottom-right, bottom-left
 * in the box's own frame, rotated by `angle` and moved to the center.
 */
export function toPolygon(box: OrientedBox): Point[] {
  const halfW = box.width / 2;
  const halfH = box.height / 2;
  const cos = Math.cos(box.angle);
  const sin = Math.sin(box.angle);

  const local: Point[] = [
    { x: -halfW, y: -halfH },
    { x: halfW, y: -halfH },
    { x: halfW, y: halfH },
    { x: -halfW, y: halfH },
  ];

  return local.map(({ x, y }) => ({
    x: cos * x - sin * y + box.centerX,
    y: sin * x + cos * y + box.centerY,
  }));
}

function isInside(point: Point, edgeStart: Point, edgeEnd: Point): boolean {
  const cross =
    (edgeEnd.x - edgeStart.x) * (point.y - edgeStart.y) -
    (edgeEnd.y - edgeStart.y) * (point.x - edgeStart.x);
  return cross >= 0;
}

function lineIntersection(p1: Point, p2: Point, clipStart: Point, clipEnd: Point): Point | null {
  const denom =
    (p1.x - p2.x) * (clipStart.y - clipEnd.y) - (p1.y - p2.y) * (clipStart.x - clipEnd.x);
  if (Math.abs(denom) < PARALLEL_EPSILON) {
    return null;
  }
  const t =
    ((p1.x - clipStart.x) * (clipStart.y - clipEnd.y) -
      (p1.y - clipStart.y) * (clipStart.x - clipEnd.x)) /
    denom;
  return { x: p1.x + t * (p2.x - p1.x), y: p1.y + t * (p2.y - p1.y) };
}

/**
 * Sutherland–Hodgman clipping of `subject` against the convex polygon `clip`.
 * Both polygons are closed implicitly (last vertex connects back to the first).
 */
export function polygonIntersection(subject: readonly Point[], clip: readonly Point[]): Point[] {
  let output: Point[] = [...subject];

  for (let i = 0; i < clip.length; i++) {
    if (output.length === 0) break;

    const clipStart = clip[i];
    const clipEnd = clip[(i + 1) % clip.length];
    const input = output;
    output = [];

    for (let j = 0; j < input.length; j++) {
      const current = input[j];
      const next = input[(j + 1) % input.length];
      const currentInside = isInside(current, clipStart, clipEnd);
      const nextInside = isInside(next, clipStart, clipEnd);

      if (currentInside && nextInside) {
        output.push(next);
      } else if (currentInside && !nextInside) {
        const hit = lineIntersection(current, next, clipStart, clipEnd);
        if (hit) output.push(hit);
      } else if (!currentInside && nextInside) {
        const hit = lineIntersection(current, next, clipStart, clipEnd);
        if (hit) output.push(hit);
        output.push(next);
      }
    }
  }

  return output;
}

/** Shoelace area; 0 for anything with fewer than 3 vertices */
export function polygonArea(polygon: readonly Point[]): number {
  if (polygon.length < 3) return 0;
  let area = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    area += a.x * b.y - b.x * a.y;
  }
  return Math.abs(area) * 0.5;
}

export function orientedArea(box: OrientedBox): number {
  return box.width * box.height;
}

export function orientedIoU(a: OrientedBox, b: OrientedBox): number {
  if (a.space !== b.space) {
    throw new CoordinateSpaceError(a.space, b.space);
  }
  const interArea = polygonArea(polygonIntersection(toPolygon(a), toPolygon(b)));
  const unionArea = orientedArea(a) + orientedArea(b) - interArea;
  return unionArea > 0 ? interArea / unionArea : 0;
}

/** Axis-aligned bounds of the rotated polygon */
export function orientedBoxBounds(box: OrientedBox): AxisBox {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const { x, y } of toPolygon(box)) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return axisBox(box.space, minX, minY, maxX, maxY);
}

/** Strict overlap test, touching edges do not count */
export function boundsIntersect(a: AxisBox, b: AxisBox): boolean {
  return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

export function asOriented(box: Box): OrientedBox {
  if (box.kind === 'oriented') return box;
  return orientedBox(
    box.space,
    (box.left + box.right) / 2,
    (box.top + box.bottom) / 2,
    box.right - box.left,
    box.bottom - box.top,
    0,
  );
}

/**
 * IoU for any pair of boxes. Two axis boxes use the closed form, anything
 * involving an oriented box goes through polygon clipping.
 */
export function boxOverlap(a: Box, b: Box): number {
  if (a.kind === 'axis' && b.kind === 'axis') {
    return axisIoU(a, b);
  }
  return orientedIoU(asOriented(a), asOriented(b));
}
