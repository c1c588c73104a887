import type { DecodeOptions } from '../../types';
import type { AxisBox } from '../../types/geometry';
import { axisBox } from '../../types/geometry';
import { ConfigurationError, ShapeMismatchError } from '../errors';
import type { ChannelView } from '../tensor';

export interface BestClass {
  classIndex: number;
  score: number;
}

/**
 * Max over `numClasses` score channels starting at `firstChannel`.
 * NaN and non-positive scores never win; `classIndex` stays -1 when nothing does.
 */
export function bestClass(
  view: ChannelView,
  anchor: number,
  firstChannel: number,
  numClasses: number,
): BestClass {
  let score = 0;
  let classIndex = -1;
  for (let c = 0; c < numClasses; c++) {
    const value = view.at(firstChannel + c, anchor);
    if (value > score) {
      score = value;
      classIndex = c;
    }
  }
  return { classIndex, score };
}

export function passesThreshold(best: BestClass, threshold: number): boolean {
  return best.classIndex >= 0 && best.score >= threshold;
}

/**
 * Class count implied by the tensor once the `fixedChannels` are taken off.
 * An explicit `numClasses` must agree with it. Labels only name classes; a
 * class without a label comes out as "Unknown".
 */
export function resolveNumClasses(
  task: string,
  view: ChannelView,
  fixedChannels: number,
  options: Pick<DecodeOptions, 'numClasses'>,
  dims: readonly number[],
): number {
  const inferred = view.channels - fixedChannels;
  const declared = options.numClasses;

  if (declared !== undefined && declared !== inferred) {
    throw new ShapeMismatchError(task, `[${fixedChannels + declared}, anchors]`, dims);
  }
  if (inferred < 1) {
    throw new ShapeMismatchError(task, `at least ${fixedChannels + 1} channels`, dims);
  }
  return inferred;
}

/**
 * Factors that bring decoded coordinates into the normalized model-input space.
 */
export function outputScale(options: Pick<DecodeOptions, 'outputCoordinates' | 'targetSize'>): [number, number] {
  if (options.outputCoordinates !== 'model') {
    return [1, 1];
  }
  if (!options.targetSize) {
    throw new ConfigurationError("outputCoordinates 'model' needs targetSize to normalize boxes");
  }
  const [width, height] = options.targetSize;
  if (!(width > 0) || !(height > 0)) {
    throw new ConfigurationError(`Invalid targetSize [${width}, ${height}]`);
  }
  return [1 / width, 1 / height];
}

/** Reads cx, cy, w, h from channels 0..3 and returns a normalized corner box */
export function centerBox(view: ChannelView, anchor: number, scaleX: number, scaleY: number): AxisBox {
  const cx = view.at(0, anchor) * scaleX;
  const cy = view.at(1, anchor) * scaleY;
  const w = view.at(2, anchor) * scaleX;
  const h = view.at(3, anchor) * scaleY;
  return axisBox('normalized', cx - w / 2, cy - h / 2, cx + w / 2, cy + h / 2);
}
