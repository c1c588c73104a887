import type { Candidate, DecodeOptions, Decoder, RawOutput } from '../../types';
import type { AxisBox } from '../../types/geometry';
import { logger } from '../logger';
import { channelView } from '../tensor';
import { bestClass, centerBox, outputScale, passesThreshold, resolveNumClasses } from './common';

/**
 * Detect head: [4 + numClasses, anchors], boxes as cx, cy, w, h.
 */
export function decodeDetections(output: RawOutput, options: DecodeOptions): Candidate<AxisBox>[] {
  const view = channelView('detect', output.primary);
  const numClasses = resolveNumClasses('detect', view, 4, options, output.primary.dims);
  const [scaleX, scaleY] = outputScale(options);
  const candidates: Candidate<AxisBox>[] = [];

  for (let i = 0; i < view.anchors; i++) {
    const best = bestClass(view, i, 4, numClasses);
    if (!passesThreshold(best, options.confidenceThreshold)) continue;

    candidates.push(
      Object.freeze({
        box: centerBox(view, i, scaleX, scaleY),
        score: best.score,
        classIndex: best.classIndex,
        order: i,
      }),
    );
  }

  logger.debug(`detect: ${candidates.length}/${view.anchors} anchors above ${options.confidenceThreshold}`);
  return candidates;
}

export const detectDecoder: Decoder<'detect'> = {
  task: 'detect',
  policy: 'per-class',
  decode: decodeDetections,
};
