import { describe, it, expect } from "vitest";
import { batchSize, channelView, sliceBatch, stripBatch } from "../src/utils/tensor";
import { ShapeMismatchError } from "../src/utils/errors";

describe("tensor views", () => {
  it("reads a [channels, anchors] tensor channel first", () => {
    const view = channelView("detect", { data: [1, 2, 3, 4, 5, 6], dims: [1, 2, 3] });
    expect(view.channels).toBe(2);
    expect(view.anchors).toBe(3);
    expect(view.at(1, 0)).toBe(4);
  });

  it("rejects data shorter than the dims promise", () => {
    expect(() => channelView("detect", { data: [1, 2], dims: [2, 3] })).toThrow(ShapeMismatchError);
  });

  it("strips only a leading batch of 1", () => {
    expect(stripBatch([1, 84, 8400])).toEqual([84, 8400]);
    expect(stripBatch([2, 84, 8400])).toEqual([2, 84, 8400]);
    expect(stripBatch([1])).toEqual([1]);
  });
});

describe("batches", () => {
  const batched = { data: Float32Array.from([1, 2, 3, 4]), dims: [2, 2, 1] };

  it("counts the batch from the rank", () => {
    expect(batchSize(batched, 2)).toBe(2);
    expect(batchSize({ data: [1, 2], dims: [2, 1] }, 2)).toBe(1);
  });

  it("slices one image out and keeps a batch dimension of 1", () => {
    const slice = sliceBatch(batched, 1, 2);
    expect(Array.from(slice.data)).toEqual([3, 4]);
    expect(slice.dims).toEqual([1, 2, 1]);
  });

  it("returns a batch of one as is", () => {
    const single = { data: [1, 2], dims: [1, 2, 1] };
    expect(sliceBatch(single, 0, 2)).toBe(single);
  });

  it("returns an output without a batch axis as is", () => {
    const scores = { data: [0.2, 0.5, 0.3], dims: [3] };
    expect(sliceBatch(scores, 0, 1)).toBe(scores);

    const anchors = { data: Float32Array.from([1, 2, 3, 4, 5, 6]), dims: [2, 3] };
    expect(sliceBatch(anchors, 0, 2)).toBe(anchors);
    expect(() => sliceBatch(anchors, 1, 2)).toThrow(RangeError);
  });

  it("rejects an index outside the batch", () => {
    expect(() => sliceBatch(batched, 2, 2)).toThrow(RangeError);
  });
});
