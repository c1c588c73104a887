import type { AxisBox, Box, KeypointSet, OrientedBox } from './types/geometry';

export type TaskKind = 'detect' | 'segment' | 'pose' | 'obb' | 'classify';

/** Clockwise rotation, in degrees, applied to a frame before it reached the model. */
export type Rotation = 0 | 90 | 180 | 270;

export type Rgba = readonly [number, number, number, number];

/**
 * Dense tensor view. Structurally compatible with an ONNX Runtime float tensor.
 */
export interface RawTensor {
  readonly data: ArrayLike<number>;
  readonly dims: readonly number[];
}

export interface RawOutput {
  primary: RawTensor;
  /** Mask prototypes, segment models only */
  prototype?: RawTensor;
}

export interface Thresholds {
  confidenceThreshold: number;
  iouThreshold: number;
  maxDetections: number;
}

export interface DecodeOptions extends Thresholds {
  labels: readonly string[];
  numClasses?: number;
  keypointCount?: number;
  maskThreshold?: number;
  protoLayout?: 'NHWC' | 'NCHW';
  /**
   * `normalized`: boxes come out of the model in [0, 1].
   * `model`: boxes are in model input pixels and get divided by `targetSize`.
   */
  outputCoordinates?: 'normalized' | 'model';
  /** Model input [width, height] */
  targetSize?: [number, number];
  applySoftmax?: boolean | 'auto';
  palette?: readonly Rgba[];
}

export interface FrameInfo {
  originalWidth: number;
  originalHeight: number;
  rotation: Rotation;
}

export interface Candidate<B extends Box = Box> {
  readonly box: B;
  readonly score: number;
  readonly classIndex: number;
  /** Decode order, used as the sort tie-breaker */
  readonly order: number;
}

export interface SegmentCandidate extends Candidate<AxisBox> {
  readonly maskCoeffs: Float32Array;
}

export interface PoseCandidate extends Candidate<AxisBox> {
  readonly keypoints: KeypointSet;
}

export interface ClassScore {
  readonly index: number;
  readonly score: number;
}

export interface DecodedByTask {
  detect: Candidate<AxisBox>[];
  segment: SegmentCandidate[];
  pose: PoseCandidate[];
  obb: Candidate<OrientedBox>[];
  classify: ClassScore[];
}

export type SuppressionPolicy = 'per-class' | 'class-agnostic';

/**
 * Turns the raw output of one task into unfiltered candidates in normalized
 * model-input space.
 */
export interface Decoder<T extends TaskKind> {
  readonly task: T;
  /** `null` for tasks without spatial candidates */
  readonly policy: SuppressionPolicy | null;
  decode(output: RawOutput, options: DecodeOptions): DecodedByTask[T];
}

export interface TaskOptions {
  labels?: string[];
  iouThreshold?: number;
  confidenceThreshold?: number;
  maxDetections?: number;
  targetSize?: [number, number];
  inputShape?: 'NCHW' | 'NHWC';
  numClasses?: number;
  keypointCount?: number;
  maskThreshold?: number;
  protoLayout?: 'NHWC' | 'NCHW';
  outputCoordinates?: 'normalized' | 'model';
  applySoftmax?: boolean | 'auto';
  rotation?: Rotation;
}

export interface PreprocessResult {
  inputTensor: Float32Array;
  frames: FrameInfo[];
}
