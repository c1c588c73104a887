import type { DecodeOptions, Decoder, RawOutput, SegmentCandidate } from '../../types';
import { MissingPrototypeError } from '../errors';
import { logger } from '../logger';
import { channelView } from '../tensor';
import { bestClass, centerBox, outputScale, passesThreshold, resolveNumClasses } from './common';
import { prototypeView } from './masks';

/**
 * Segment head: [4 + numClasses + maskCoeffCount, anchors] plus the prototype
 * tensor. The coefficient count comes from the prototype channels.
 */
export function decodeSegments(output: RawOutput, options: DecodeOptions): SegmentCandidate[] {
  if (!output.prototype) {
    throw new MissingPrototypeError();
  }
  const proto = prototypeView(output.prototype, options.protoLayout ?? 'NHWC');
  const view = channelView('segment', output.primary);
  const numClasses = resolveNumClasses('segment', view, 4 + proto.channels, options, output.primary.dims);
  const [scaleX, scaleY] = outputScale(options);
  const coeffBase = 4 + numClasses;
  const candidates: SegmentCandidate[] = [];

  for (let i = 0; i < view.anchors; i++) {
    const best = bestClass(view, i, 4, numClasses);
    if (!passesThreshold(best, options.confidenceThreshold)) continue;

    const maskCoeffs = new Float32Array(proto.channels);
    for (let m = 0; m < proto.channels; m++) {
      maskCoeffs[m] = view.at(coeffBase + m, i);
    }

    candidates.push(
      Object.freeze({
        box: centerBox(view, i, scaleX, scaleY),
        score: best.score,
        classIndex: best.classIndex,
        order: i,
        maskCoeffs,
      }),
    );
  }

  logger.debug(`segment: ${candidates.length}/${view.anchors} anchors above ${options.confidenceThreshold}`);
  return candidates;
}

export const segmentDecoder: Decoder<'segment'> = {
  task: 'segment',
  policy: 'per-class',
  decode: decodeSegments,
};
