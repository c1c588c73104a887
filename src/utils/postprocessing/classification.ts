import type { ClassScore, DecodeOptions, Decoder, RawOutput } from '../../types';
import { ShapeMismatchError } from '../errors';
import { stripBatch } from '../tensor';

/**
 * Apply softmax to convert logits to probabilities. NaN logits get probability 0.
 */
export function softmax(arr: readonly number[]): number[] {
  const maxLogit = Math.max(...arr.filter((logit) => !Number.isNaN(logit)));
  const scores = arr.map((logit) => (Number.isNaN(logit) ? 0 : Math.exp(logit - maxLogit)));
  const sum = scores.reduce((a, b) => a + b, 0);
  return scores.map((score) => (sum > 0 ? score / sum : 0));
}

function looksLikeLogits(scores: readonly number[]): boolean {
  return scores.some((s) => s < 0 || s > 1);
}

// NaN sorts below every real score
const rankValue = (score: number) => (Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score);

/**
 * 클래스 점수를 내림차순으로 정렬합니다. Ties keep the class order.
 */
export function rankClassScores(output: RawOutput, options: Pick<DecodeOptions, 'applySoftmax'>): ClassScore[] {
  const dims = stripBatch(output.primary.dims);
  if (dims.length !== 1 || dims[0] < 1) {
    throw new ShapeMismatchError('classify', '[numClasses]', output.primary.dims);
  }

  let scores = Array.from({ length: dims[0] }, (_, i) => output.primary.data[i]);
  const mode = options.applySoftmax ?? false;
  if (mode === true || (mode === 'auto' && looksLikeLogits(scores))) {
    scores = softmax(scores);
  }

  return scores
    .map((score, index) => Object.freeze({ index, score }))
    .sort((a, b) => rankValue(b.score) - rankValue(a.score) || a.index - b.index);
}

export const classifyDecoder: Decoder<'classify'> = {
  task: 'classify',
  policy: null,
  decode: rankClassScores,
};
