import type { Candidate, SuppressionPolicy } from '../types';
import type { AxisBox } from '../types/geometry';
import { boundsIntersect, boxOverlap, orientedBoxBounds } from './geometry';

export interface SuppressOptions {
  iouThreshold: number;
  policy: SuppressionPolicy;
  /** Cap on the merged output; 0 or undefined keeps everything */
  maxDetections?: number;
}

/** Score descending, decode order on ties */
export function sortByScore<C extends Candidate>(candidates: readonly C[]): C[] {
  return [...candidates].sort((a, b) => b.score - a.score || a.order - b.order);
}

/**
 * Greedy NMS over one group. A later candidate is dropped once its overlap with
 * an already picked one is above `iouThreshold`.
 */
export function nonMaxSuppression<C extends Candidate>(candidates: readonly C[], iouThreshold: number): C[] {
  const sorted = sortByScore(candidates);
  const active = new Array<boolean>(sorted.length).fill(true);
  // AABB of each rotated box, so disjoint pairs skip polygon clipping
  const bounds: (AxisBox | null)[] = sorted.map(({ box }) => (box.kind === 'oriented' ? orientedBoxBounds(box) : null));
  const picked: C[] = [];

  for (let i = 0; i < sorted.length; i++) {
    if (!active[i]) continue;
    picked.push(sorted[i]);

    const boundsA = bounds[i];
    for (let j = i + 1; j < sorted.length; j++) {
      if (!active[j]) continue;

      const boundsB = bounds[j];
      if (boundsA && boundsB && !boundsIntersect(boundsA, boundsB)) continue;

      if (boxOverlap(sorted[i].box, sorted[j].box) > iouThreshold) {
        active[j] = false;
      }
    }
  }

  return picked;
}

function groupByClass<C extends Candidate>(candidates: readonly C[]): C[][] {
  const groups = new Map<number, C[]>();
  for (const candidate of candidates) {
    const group = groups.get(candidate.classIndex);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.classIndex, [candidate]);
    }
  }
  return [...groups.values()];
}

/**
 * Runs NMS per class or over everything at once, then merges the survivors in
 * score order and applies `maxDetections`.
 */
export function suppress<C extends Candidate>(candidates: readonly C[], options: SuppressOptions): C[] {
  if (candidates.length === 0) return [];

  const groups = options.policy === 'per-class' ? groupByClass(candidates) : [[...candidates]];
  const kept = sortByScore(groups.flatMap((group) => nonMaxSuppression(group, options.iouThreshold)));

  return options.maxDetections && options.maxDetections > 0 ? kept.slice(0, options.maxDetections) : kept;
}
