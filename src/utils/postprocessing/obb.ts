import type { Candidate, DecodeOptions, Decoder, RawOutput } from '../../types';
import type { OrientedBox } from '../../types/geometry';
import { orientedBox } from '../../types/geometry';
import { logger } from '../logger';
import { channelView } from '../tensor';
import { bestClass, outputScale, passesThreshold, resolveNumClasses } from './common';

/**
 * OBB head: [4 + numClasses + 1, anchors]; the last channel is the angle in radians.
 */
export function decodeOrientedBoxes(output: RawOutput, options: DecodeOptions): Candidate<OrientedBox>[] {
  const view = channelView('obb', output.primary);
  const numClasses = resolveNumClasses('obb', view, 5, options, output.primary.dims);
  const [scaleX, scaleY] = outputScale(options);
  const angleChannel = 4 + numClasses;
  const candidates: Candidate<OrientedBox>[] = [];

  for (let i = 0; i < view.anchors; i++) {
    const best = bestClass(view, i, 4, numClasses);
    if (!passesThreshold(best, options.confidenceThreshold)) continue;

    candidates.push(
      Object.freeze({
        box: orientedBox(
          'normalized',
          view.at(0, i) * scaleX,
          view.at(1, i) * scaleY,
          view.at(2, i) * scaleX,
          view.at(3, i) * scaleY,
          view.at(angleChannel, i),
        ),
        score: best.score,
        classIndex: best.classIndex,
        order: i,
      }),
    );
  }

  logger.debug(`obb: ${candidates.length}/${view.anchors} anchors above ${options.confidenceThreshold}`);
  return candidates;
}

export const obbDecoder: Decoder<'obb'> = {
  task: 'obb',
  policy: 'per-class',
  decode: decodeOrientedBoxes,
};
