import type { DecodeOptions, Decoder, PoseCandidate, RawOutput } from '../../types';
import type { Keypoint } from '../../types/geometry';
import { ShapeMismatchError } from '../errors';
import { logger } from '../logger';
import { channelView } from '../tensor';
import { centerBox, outputScale } from './common';

export const DEFAULT_KEYPOINT_COUNT = 17;

// cx, cy, w, h, person score
const POSE_FIXED_CHANNELS = 5;

/**
 * Pose head: [5 + keypointCount * 3, anchors]. Single class, keypoints as
 * (x, y, confidence) triples starting at channel 5.
 */
export function decodePoses(output: RawOutput, options: DecodeOptions): PoseCandidate[] {
  const view = channelView('pose', output.primary);
  const keypointCount = options.keypointCount ?? DEFAULT_KEYPOINT_COUNT;
  const expected = POSE_FIXED_CHANNELS + keypointCount * 3;
  if (view.channels !== expected) {
    throw new ShapeMismatchError('pose', `[${expected}, anchors] for ${keypointCount} keypoints`, output.primary.dims);
  }
  const [scaleX, scaleY] = outputScale(options);
  const candidates: PoseCandidate[] = [];

  for (let i = 0; i < view.anchors; i++) {
    const score = view.at(4, i);
    // NaN fails both comparisons
    if (!(score > 0 && score >= options.confidenceThreshold)) continue;

    const points: Keypoint[] = [];
    for (let k = 0; k < keypointCount; k++) {
      const base = POSE_FIXED_CHANNELS + k * 3;
      points.push(
        Object.freeze({
          x: view.at(base, i) * scaleX,
          y: view.at(base + 1, i) * scaleY,
          confidence: view.at(base + 2, i),
        }),
      );
    }

    candidates.push(
      Object.freeze({
        box: centerBox(view, i, scaleX, scaleY),
        score,
        classIndex: 0,
        order: i,
        keypoints: Object.freeze({ space: 'normalized' as const, points: Object.freeze(points) }),
      }),
    );
  }

  logger.debug(`pose: ${candidates.length}/${view.anchors} anchors above ${options.confidenceThreshold}`);
  return candidates;
}

export const poseDecoder: Decoder<'pose'> = {
  task: 'pose',
  policy: 'class-agnostic',
  decode: decodePoses,
};
