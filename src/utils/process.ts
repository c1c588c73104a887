import type { Candidate, DecodeOptions, Decoder, FrameInfo, RawOutput, SuppressionPolicy, TaskKind } from '../types';
import type { AxisBox } from '../types/geometry';
import type { ResultByTask } from '../types/results';
import { toPixelBox, toPixelKeypoints, toPixelOrientedBox, unrotateBox, unrotateKeypoints, unrotateOrientedBox } from './coordinates';
import { MissingPrototypeError } from './errors';
import type { FormatInputByTask, MappedDetection } from './formatters/resultFormatter';
import { formatResult } from './formatters/resultFormatter';
import { toPolygon } from './geometry';
import { logger } from './logger';
import { suppress } from './nms';
import { classifyDecoder } from './postprocessing/classification';
import { detectDecoder } from './postprocessing/detection';
import { assembleMasks, prototypeView } from './postprocessing/masks';
import { obbDecoder } from './postprocessing/obb';
import { poseDecoder } from './postprocessing/pose';
import { segmentDecoder } from './postprocessing/segmentation';
import type { FrameTimer } from './timing';

export const decoders: { [K in TaskKind]: Decoder<K> } = {
  detect: detectDecoder,
  segment: segmentDecoder,
  pose: poseDecoder,
  obb: obbDecoder,
  classify: classifyDecoder,
};

export interface DecodeContext {
  frame: FrameInfo;
  /** Supplies processingTimeMs and fps; both are 0 without one */
  timer?: FrameTimer;
  /** Start of the call on `timer`'s clock, defaults to the start of `decode` */
  startedAt?: number;
}

type Stage<K extends TaskKind> = (output: RawOutput, options: DecodeOptions, frame: FrameInfo) => FormatInputByTask[K];

interface SpatialDecoder<C extends Candidate> {
  readonly task: TaskKind;
  readonly policy: SuppressionPolicy | null;
  decode(output: RawOutput, options: DecodeOptions): C[];
}

function survivors<C extends Candidate>(decoder: SpatialDecoder<C>, output: RawOutput, options: DecodeOptions): C[] {
  const candidates = decoder.decode(output, options);
  const kept = suppress(candidates, {
    iouThreshold: options.iouThreshold,
    policy: decoder.policy ?? 'class-agnostic',
    maxDetections: options.maxDetections,
  });
  logger.debug(`${decoder.task}: kept ${kept.length} of ${candidates.length} candidates`);
  return kept;
}

function mapAxis(candidate: Candidate<AxisBox>, frame: FrameInfo): MappedDetection {
  return {
    classIndex: candidate.classIndex,
    score: candidate.score,
    box: toPixelBox(candidate.box, frame),
    normalizedBox: unrotateBox(candidate.box, frame.rotation),
  };
}

function logMapping(task: TaskKind, count: number, frame: FrameInfo): void {
  if (count === 0) return;
  logger.debug(
    `${task}: mapping ${count} boxes from normalized to ${frame.originalWidth}x${frame.originalHeight} pixels, rotation ${frame.rotation}`,
  );
}

const stages: { [K in TaskKind]: Stage<K> } = {
  detect: (output, options, frame) => {
    const kept = survivors(decoders.detect, output, options);
    logMapping('detect', kept.length, frame);
    return { detections: kept.map((c) => mapAxis(c, frame)) };
  },

  segment: (output, options, frame) => {
    const kept = survivors(decoders.segment, output, options);
    if (!output.prototype) throw new MissingPrototypeError();

    const proto = prototypeView(output.prototype, options.protoLayout ?? 'NHWC');
    const { probabilityMasks, combinedMask } = assembleMasks(kept, proto, {
      threshold: options.maskThreshold,
      palette: options.palette,
    });
    logMapping('segment', kept.length, frame);

    return {
      detections: kept.map((c) => mapAxis(c, frame)),
      masks: probabilityMasks && combinedMask ? Object.freeze({ probabilityMasks: Object.freeze(probabilityMasks), combinedMask }) : null,
    };
  },

  pose: (output, options, frame) => {
    const kept = survivors(decoders.pose, output, options);
    logMapping('pose', kept.length, frame);
    return {
      detections: kept.map((c) => ({
        ...mapAxis(c, frame),
        keypoints: Object.freeze({
          xy: toPixelKeypoints(c.keypoints, frame),
          xyn: unrotateKeypoints(c.keypoints, frame.rotation),
        }),
      })),
    };
  },

  obb: (output, options, frame) => {
    const kept = survivors(decoders.obb, output, options);
    logMapping('obb', kept.length, frame);
    return {
      detections: kept.map((c) => {
        const normalizedBox = unrotateOrientedBox(c.box, frame.rotation);
        return {
          classIndex: c.classIndex,
          score: c.score,
          box: toPixelOrientedBox(c.box, frame),
          normalizedBox,
          // corners scaled point by point; a non-square frame shears the rectangle
          polygon: toPolygon(normalizedBox).map((p) => ({
            x: p.x * frame.originalWidth,
            y: p.y * frame.originalHeight,
          })),
        };
      }),
    };
  },

  classify: (output, options) => ({ scores: decoders.classify.decode(output, options) }),
};

/**
 * 모델의 출력을 처리합니다. Raw output of one image → frozen result in
 * original image coordinates. Synchronous; throws on malformed output.
 */
export function decode<T extends TaskKind>(
  task: T,
  output: RawOutput,
  options: DecodeOptions,
  context: DecodeContext,
): ResultByTask[T] {
  const { frame, timer } = context;
  const startedAt = context.startedAt ?? timer?.now() ?? 0;

  const stage: Stage<T> = stages[task];
  const input = stage(output, options, frame);
  const sample = timer?.mark(startedAt);

  return formatResult(task, input, {
    frame,
    labels: options.labels,
    confidenceThreshold: options.confidenceThreshold,
    processingTimeMs: sample?.processingTimeMs ?? 0,
    fps: sample?.fps ?? 0,
  });
}
