import type { RawTensor, Rgba, SegmentCandidate } from '../../types';
import type { CombinedMask, ProbabilityMask } from '../../types/results';
import { CLASS_PALETTE, classColor } from '../../constants/palette';
import { ShapeMismatchError } from '../errors';
import { stripBatch } from '../tensor';

export const DEFAULT_MASK_THRESHOLD = 0.5;

export interface PrototypeView {
  readonly height: number;
  readonly width: number;
  readonly channels: number;
  at(y: number, x: number, c: number): number;
}

/**
 * Prototype tensor accessor. `NHWC` is [maskH, maskW, channels],
 * `NCHW` is [channels, maskH, maskW] (what ONNX exports emit).
 */
export function prototypeView(tensor: RawTensor, layout: 'NHWC' | 'NCHW'): PrototypeView {
  const dims = stripBatch(tensor.dims);
  if (dims.length !== 3) {
    throw new ShapeMismatchError('segment prototype', layout === 'NHWC' ? '[maskH, maskW, channels]' : '[channels, maskH, maskW]', tensor.dims);
  }
  const { data } = tensor;

  if (layout === 'NHWC') {
    const [height, width, channels] = dims;
    return {
      height,
      width,
      channels,
      at: (y, x, c) => data[(y * width + x) * channels + c],
    };
  }

  const [channels, height, width] = dims;
  const plane = height * width;
  return {
    height,
    width,
    channels,
    at: (y, x, c) => data[c * plane + y * width + x],
  };
}

export interface MaskAssembly {
  probabilityMasks: ProbabilityMask[] | null;
  combinedMask: CombinedMask | null;
}

export interface MaskOptions {
  threshold?: number;
  palette?: readonly Rgba[];
}

/**
 * Per-pixel dot product of each detection's coefficients with the prototypes.
 * The combined RGBA mask paints every pixel above `threshold` with the class
 * color; later detections overwrite earlier ones.
 */
export function assembleMasks(
  detections: readonly Pick<SegmentCandidate, 'classIndex' | 'maskCoeffs'>[],
  proto: PrototypeView,
  options: MaskOptions = {},
): MaskAssembly {
  if (detections.length === 0) {
    return { probabilityMasks: null, combinedMask: null };
  }
  const threshold = options.threshold ?? DEFAULT_MASK_THRESHOLD;
  const palette = options.palette ?? CLASS_PALETTE;
  const { width, height, channels } = proto;

  // transparent by default
  const pixels = new Uint8ClampedArray(width * height * 4);
  const probabilityMasks: ProbabilityMask[] = [];

  for (const det of detections) {
    if (det.maskCoeffs.length !== channels) {
      throw new ShapeMismatchError('segment mask coefficients', `${channels} coefficients`, [det.maskCoeffs.length]);
    }
    const [r, g, b, a] = classColor(det.classIndex, palette);
    const rows: Float32Array[] = [];

    for (let y = 0; y < height; y++) {
      const row = new Float32Array(width);
      for (let x = 0; x < width; x++) {
        let v = 0;
        for (let c = 0; c < channels; c++) {
          v += det.maskCoeffs[c] * proto.at(y, x, c);
        }
        row[x] = v;

        if (v > threshold) {
          const p = (y * width + x) * 4;
          pixels[p] = r;
          pixels[p + 1] = g;
          pixels[p + 2] = b;
          pixels[p + 3] = a;
        }
      }
      rows.push(row);
    }
    probabilityMasks.push(Object.freeze(rows));
  }

  return {
    probabilityMasks,
    combinedMask: Object.freeze({ width, height, data: pixels }),
  };
}
