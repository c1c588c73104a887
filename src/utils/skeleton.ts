import type { Rgba } from '../types';
import type { KeypointSet, Point } from '../types/geometry';
import { COCO_SKELETON, KEYPOINT_COLOR_INDICES, LIMB_COLOR_INDICES, POSE_PALETTE, classColor } from '../constants/palette';

export const DEFAULT_KEYPOINT_CONFIDENCE = 0.25;

export interface Limb {
  from: Point;
  to: Point;
  color: Rgba;
}

export interface ColoredKeypoint extends Point {
  index: number;
  color: Rgba;
}

/**
 * COCO limbs whose two end points are both at or above `minConfidence`.
 * Pairs that point past the end of the set are skipped.
 */
export function skeletonLimbs(set: KeypointSet, minConfidence = DEFAULT_KEYPOINT_CONFIDENCE): Limb[] {
  const limbs: Limb[] = [];
  COCO_SKELETON.forEach(([a, b], i) => {
    const from = set.points[a];
    const to = set.points[b];
    if (!from || !to) return;
    if (from.confidence < minConfidence || to.confidence < minConfidence) return;
    limbs.push({
      from: { x: from.x, y: from.y },
      to: { x: to.x, y: to.y },
      color: classColor(LIMB_COLOR_INDICES[i], POSE_PALETTE),
    });
  });
  return limbs;
}

export function visibleKeypoints(set: KeypointSet, minConfidence = DEFAULT_KEYPOINT_CONFIDENCE): ColoredKeypoint[] {
  return set.points.flatMap((kp, index) =>
    kp.confidence >= minConfidence
      ? [{ index, x: kp.x, y: kp.y, color: classColor(KEYPOINT_COLOR_INDICES[index] ?? 0, POSE_PALETTE) }]
      : [],
  );
}
