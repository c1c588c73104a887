import type { RawTensor } from '../types';
import { ShapeMismatchError } from './errors';

/**
 * Channel-first 2D view over a [channels, anchors] tensor, with or without a
 * leading batch dimension of 1.
 */
export interface ChannelView {
  readonly channels: number;
  readonly anchors: number;
  at(channel: number, anchor: number): number;
}

export function channelView(task: string, tensor: RawTensor): ChannelView {
  const dims = stripBatch(tensor.dims);
  if (dims.length !== 2) {
    throw new ShapeMismatchError(task, '[channels, anchors]', tensor.dims);
  }
  const [channels, anchors] = dims;
  if (tensor.data.length < channels * anchors) {
    throw new ShapeMismatchError(task, `${channels * anchors} values`, [tensor.data.length]);
  }
  const { data } = tensor;
  return {
    channels,
    anchors,
    at: (channel, anchor) => data[channel * anchors + anchor],
  };
}

export function stripBatch(dims: readonly number[]): readonly number[] {
  return dims.length > 1 && dims[0] === 1 ? dims.slice(1) : dims;
}

export function batchSize(tensor: RawTensor, unbatchedRank: number): number {
  return tensor.dims.length > unbatchedRank ? tensor.dims[0] : 1;
}

/**
 * Slices one image out of a batched tensor, keeping a batch dimension of 1.
 * A tensor no deeper than `unbatchedRank` has no batch axis and is returned
 * as is for image 0.
 */
export function sliceBatch(tensor: RawTensor, index: number, unbatchedRank: number): RawTensor {
  const batch = batchSize(tensor, unbatchedRank);
  if (index < 0 || index >= batch) {
    throw new RangeError(`Batch index ${index} out of range for batch of ${batch}`);
  }
  if (tensor.dims.length <= unbatchedRank) return tensor;
  const rest = tensor.dims.slice(1);
  if (batch === 1) return tensor;
  const size = rest.reduce((acc, d) => acc * d, 1);
  const data = Float32Array.from({ length: size }, (_, i) => tensor.data[index * size + i]);
  return { data, dims: [1, ...rest] };
}
