import type { ClassScore, FrameInfo, TaskKind } from '../../types';
import type { AxisBox, OrientedBox, Point } from '../../types/geometry';
import type {
  ClassifyResult,
  DetectedBox,
  DetectResult,
  Masks,
  ObbResult,
  OrientedDetection,
  PoseKeypoints,
  PoseResult,
  ResultByTask,
  SegmentResult,
} from '../../types/results';
import { InvariantViolationError } from '../errors';

export const UNKNOWN_LABEL = 'Unknown';
const TOP_K = 5;

/** A surviving candidate after coordinate mapping, before labels are attached */
export interface MappedDetection {
  classIndex: number;
  score: number;
  box: AxisBox;
  normalizedBox: AxisBox;
}

export interface MappedPose extends MappedDetection {
  keypoints: PoseKeypoints;
}

export interface MappedOrientedBox {
  classIndex: number;
  score: number;
  box: OrientedBox;
  normalizedBox: OrientedBox;
  polygon: Point[];
}

export interface FormatInputByTask {
  detect: { detections: MappedDetection[] };
  segment: { detections: MappedDetection[]; masks: Masks | null };
  pose: { detections: MappedPose[] };
  obb: { detections: MappedOrientedBox[] };
  classify: { scores: ClassScore[] };
}

export interface FormatContext {
  frame: FrameInfo;
  labels: readonly string[];
  confidenceThreshold: number;
  processingTimeMs: number;
  fps: number;
}

export function labelFor(labels: readonly string[], index: number): string {
  return (index >= 0 && index < labels.length ? labels[index] : undefined) ?? UNKNOWN_LABEL;
}

function checkScores(task: TaskKind, detections: readonly { score: number }[], threshold: number): void {
  for (const { score } of detections) {
    if (!(score >= threshold)) {
      throw new InvariantViolationError(`${task} result holds a score of ${score} below the threshold ${threshold}`);
    }
  }
}

function meta<T extends TaskKind>(task: T, context: FormatContext) {
  return {
    task,
    originalWidth: context.frame.originalWidth,
    originalHeight: context.frame.originalHeight,
    processingTimeMs: context.processingTimeMs,
    fps: context.fps,
    names: Object.freeze([...context.labels]),
  };
}

function detectedBoxes(detections: readonly MappedDetection[], labels: readonly string[]): readonly DetectedBox[] {
  return Object.freeze(
    detections.map((det) =>
      Object.freeze({
        index: det.classIndex,
        label: labelFor(labels, det.classIndex),
        confidence: det.score,
        box: det.box,
        normalizedBox: det.normalizedBox,
      }),
    ),
  );
}

type Formatter<K extends TaskKind> = (input: FormatInputByTask[K], context: FormatContext) => ResultByTask[K];

const formatters: { [K in TaskKind]: Formatter<K> } = {
  detect: ({ detections }, context): DetectResult => {
    checkScores('detect', detections, context.confidenceThreshold);
    return Object.freeze({ ...meta('detect', context), boxes: detectedBoxes(detections, context.labels) });
  },

  segment: ({ detections, masks }, context): SegmentResult => {
    checkScores('segment', detections, context.confidenceThreshold);
    if ((masks === null) !== (detections.length === 0)) {
      throw new InvariantViolationError('segment masks must be present exactly when there are detections');
    }
    if (masks && masks.probabilityMasks.length !== detections.length) {
      throw new InvariantViolationError(
        `segment result has ${masks.probabilityMasks.length} masks for ${detections.length} detections`,
      );
    }
    return Object.freeze({
      ...meta('segment', context),
      boxes: detectedBoxes(detections, context.labels),
      masks,
    });
  },

  pose: ({ detections }, context): PoseResult => {
    checkScores('pose', detections, context.confidenceThreshold);
    return Object.freeze({
      ...meta('pose', context),
      boxes: detectedBoxes(detections, context.labels),
      keypointSets: Object.freeze(detections.map((det) => det.keypoints)),
    });
  },

  obb: ({ detections }, context): ObbResult => {
    checkScores('obb', detections, context.confidenceThreshold);
    const orientedBoxes: OrientedDetection[] = detections.map((det) =>
      Object.freeze({
        index: det.classIndex,
        label: labelFor(context.labels, det.classIndex),
        confidence: det.score,
        box: det.box,
        normalizedBox: det.normalizedBox,
        polygon: Object.freeze(det.polygon.map((p) => Object.freeze({ x: p.x, y: p.y }))),
      }),
    );
    return Object.freeze({ ...meta('obb', context), orientedBoxes: Object.freeze(orientedBoxes) });
  },

  classify: ({ scores }, context): ClassifyResult => {
    const [top1] = scores;
    if (!top1) {
      throw new InvariantViolationError('classify result needs at least one class score');
    }
    const top = scores.slice(0, TOP_K);
    return Object.freeze({
      ...meta('classify', context),
      probs: Object.freeze({
        top1: labelFor(context.labels, top1.index),
        top1Index: top1.index,
        top1Conf: top1.score,
        top5: Object.freeze(top.map((s) => labelFor(context.labels, s.index))),
        top5Confs: Object.freeze(top.map((s) => s.score)),
      }),
    });
  },
};

/**
 * 결과를 형식화합니다. Attaches labels and timing, checks the score invariant
 * and returns a frozen result.
 */
export function formatResult<T extends TaskKind>(
  task: T,
  input: FormatInputByTask[T],
  context: FormatContext,
): ResultByTask[T] {
  const format: Formatter<T> = formatters[task];
  return format(input, context);
}
