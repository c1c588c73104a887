import type { AxisBox, KeypointSet, OrientedBox } from './geometry';
import type { TaskKind } from '../types';

export interface DetectedBox {
  readonly index: number;
  readonly label: string;
  readonly confidence: number;
  /** Original image pixels */
  readonly box: AxisBox;
  /** Normalized [0, 1] coordinates of the original image */
  readonly normalizedBox: AxisBox;
}

export interface CombinedMask {
  readonly width: number;
  readonly height: number;
  /** RGBA, row major */
  readonly data: Uint8ClampedArray;
}

/** One [maskH][maskW] grid of raw (unthresholded) mask values per detection */
export type ProbabilityMask = readonly Float32Array[];

export interface Masks {
  readonly probabilityMasks: readonly ProbabilityMask[];
  readonly combinedMask: CombinedMask;
  /** PNG of `combinedMask`, present when the builder was asked to encode masks */
  readonly png?: Buffer;
}

export interface PoseKeypoints {
  /** Original image pixels */
  readonly xy: KeypointSet;
  readonly xyn: KeypointSet;
}

export interface OrientedDetection {
  readonly index: number;
  readonly label: string;
  readonly confidence: number;
  readonly box: OrientedBox;
  readonly normalizedBox: OrientedBox;
  /** Four pixel-space corners, top-left first */
  readonly polygon: readonly { x: number; y: number }[];
}

export interface Probs {
  readonly top1: string;
  readonly top1Index: number;
  readonly top1Conf: number;
  readonly top5: readonly string[];
  readonly top5Confs: readonly number[];
}

interface ResultMeta<T extends TaskKind> {
  readonly task: T;
  readonly originalWidth: number;
  readonly originalHeight: number;
  readonly processingTimeMs: number;
  readonly fps: number;
  readonly names: readonly string[];
}

export interface DetectResult extends ResultMeta<'detect'> {
  readonly boxes: readonly DetectedBox[];
}

export interface SegmentResult extends ResultMeta<'segment'> {
  readonly boxes: readonly DetectedBox[];
  readonly masks: Masks | null;
}

export interface PoseResult extends ResultMeta<'pose'> {
  readonly boxes: readonly DetectedBox[];
  readonly keypointSets: readonly PoseKeypoints[];
}

export interface ObbResult extends ResultMeta<'obb'> {
  readonly orientedBoxes: readonly OrientedDetection[];
}

export interface ClassifyResult extends ResultMeta<'classify'> {
  readonly probs: Probs;
}

export type ResultSet = DetectResult | SegmentResult | PoseResult | ObbResult | ClassifyResult;

export interface ResultByTask {
  detect: DetectResult;
  segment: SegmentResult;
  pose: PoseResult;
  obb: ObbResult;
  classify: ClassifyResult;
}

export function isDetectResult(result: ResultSet): result is DetectResult {
  return result.task === 'detect';
}

export function isSegmentResult(result: ResultSet): result is SegmentResult {
  return result.task === 'segment';
}

export function isPoseResult(result: ResultSet): result is PoseResult {
  return result.task === 'pose';
}

export function isObbResult(result: ResultSet): result is ObbResult {
  return result.task === 'obb';
}

export function isClassifyResult(result: ResultSet): result is ClassifyResult {
  return result.task === 'classify';
}
