import { describe, it, expect } from "vitest";
import type { DecodeOptions, RawTensor } from "../src/types";
import { decodeDetections } from "../src/utils/postprocessing/detection";
import { decodeSegments } from "../src/utils/postprocessing/segmentation";
import { decodePoses } from "../src/utils/postprocessing/pose";
import { decodeOrientedBoxes } from "../src/utils/postprocessing/obb";
import { rankClassScores, softmax } from "../src/utils/postprocessing/classification";
import { decoders } from "../src/utils/process";
import { ConfigurationError, MissingPrototypeError, ShapeMismatchError } from "../src/utils/errors";

/** Builds a [1, channels, anchors] tensor from one row per channel */
function channelTensor(rows: number[][]): RawTensor {
  return { data: rows.flat(), dims: [1, rows.length, rows[0].length] };
}

function options(overrides: Partial<DecodeOptions> = {}): DecodeOptions {
  return {
    confidenceThreshold: 0.25,
    iouThreshold: 0.45,
    maxDetections: 30,
    labels: [],
    ...overrides,
  };
}

// 2 classes, 3 anchors; only anchor 0 clears 0.25
const detectTensor = channelTensor([
  [0.5, 0.2, 0.8],
  [0.5, 0.2, 0.8],
  [0.2, 0.1, 0.1],
  [0.4, 0.1, 0.1],
  [0.9, 0.05, 0.02],
  [0.05, 0.08, 0.01],
]);

describe("decodeDetections", () => {
  it("emits one candidate for the single anchor above the threshold", () => {
    const candidates = decodeDetections({ primary: detectTensor }, options({ labels: ["cat", "dog"] }));
    expect(candidates).toHaveLength(1);
    const [candidate] = candidates;
    expect(candidate.classIndex).toBe(0);
    expect(candidate.score).toBe(0.9);
    expect(candidate.order).toBe(0);
    expect(candidate.box.space).toBe("normalized");
    expect(candidate.box.left).toBeCloseTo(0.4, 10);
    expect(candidate.box.top).toBeCloseTo(0.3, 10);
    expect(candidate.box.right).toBeCloseTo(0.6, 10);
    expect(candidate.box.bottom).toBeCloseTo(0.7, 10);
  });

  it("returns an empty list when nothing passes", () => {
    expect(decodeDetections({ primary: detectTensor }, options({ confidenceThreshold: 0.95 }))).toEqual([]);
  });

  it("never picks NaN or negative scores", () => {
    const tensor = channelTensor([[0.5], [0.5], [0.1], [0.1], [Number.NaN], [-0.5]]);
    expect(decodeDetections({ primary: tensor }, options({ confidenceThreshold: 0 }))).toEqual([]);
  });

  it("skips a NaN class and takes the next best", () => {
    const tensor = channelTensor([[0.5], [0.5], [0.1], [0.1], [Number.NaN], [0.6]]);
    const [candidate] = decodeDetections({ primary: tensor }, options());
    expect(candidate.classIndex).toBe(1);
    expect(candidate.score).toBe(0.6);
  });

  it("infers the class count when no labels are given", () => {
    expect(decodeDetections({ primary: detectTensor }, options())).toHaveLength(1);
  });

  it("takes the class count from the tensor, not the label list", () => {
    expect(decodeDetections({ primary: detectTensor }, options({ labels: ["cat", "dog", "bird"] }))).toHaveLength(1);
  });

  it("rejects an explicit class count that does not match the tensor", () => {
    expect(() => decodeDetections({ primary: detectTensor }, options({ numClasses: 3 }))).toThrow(ShapeMismatchError);
  });

  it("lets numClasses take precedence over the label list", () => {
    const candidates = decodeDetections({ primary: detectTensor }, options({ labels: ["cat"], numClasses: 2 }));
    expect(candidates).toHaveLength(1);
  });

  it("rejects tensors of the wrong rank", () => {
    expect(() => decodeDetections({ primary: { data: [1, 2, 3], dims: [3] } }, options())).toThrow(
      ShapeMismatchError,
    );
  });

  it("divides model pixel coordinates by the input size", () => {
    const tensor = channelTensor([[320], [320], [128], [256], [0.9], [0.1]]);
    const [candidate] = decodeDetections(
      { primary: tensor },
      options({ outputCoordinates: "model", targetSize: [640, 640] }),
    );
    expect(candidate.box.left).toBeCloseTo(0.4, 10);
    expect(candidate.box.top).toBeCloseTo(0.3, 10);
    expect(candidate.box.right).toBeCloseTo(0.6, 10);
    expect(candidate.box.bottom).toBeCloseTo(0.7, 10);
  });

  it("needs targetSize for model coordinates", () => {
    expect(() => decodeDetections({ primary: detectTensor }, options({ outputCoordinates: "model" }))).toThrow(
      ConfigurationError,
    );
  });

  it("never yields more candidates at a higher threshold", () => {
    const counts = [0.01, 0.05, 0.25, 0.5, 0.95].map(
      (confidenceThreshold) => decodeDetections({ primary: detectTensor }, options({ confidenceThreshold })).length,
    );
    expect(counts).toEqual([3, 2, 1, 1, 0]);
  });
});

describe("decodeSegments", () => {
  // 1 class, 2 mask coefficients, 2 anchors
  const primary = channelTensor([
    [0.5, 0.5],
    [0.5, 0.5],
    [0.5, 0.5],
    [0.5, 0.5],
    [0.8, 0.1],
    [1, 0],
    [0.5, 0],
  ]);
  const prototype: RawTensor = { data: [1, 0, 0, 1, 1, 1, 0, 0], dims: [1, 2, 2, 2] };

  it("slices the trailing channels into mask coefficients", () => {
    const candidates = decodeSegments({ primary, prototype }, options({ labels: ["blob"] }));
    expect(candidates).toHaveLength(1);
    expect(candidates[0].score).toBe(0.8);
    expect(Array.from(candidates[0].maskCoeffs)).toEqual([1, 0.5]);
  });

  it("fails right away without a prototype tensor", () => {
    expect(() => decodeSegments({ primary }, options())).toThrow(MissingPrototypeError);
  });

  it("rejects a prototype with a different coefficient count", () => {
    const wide: RawTensor = { data: new Array(12).fill(0), dims: [1, 2, 2, 3] };
    expect(() => decodeSegments({ primary, prototype: wide }, options({ labels: ["blob"] }))).toThrow(
      ShapeMismatchError,
    );
  });
});

describe("decodePoses", () => {
  // 2 keypoints, 2 anchors
  const primary = channelTensor([
    [0.5, 0.5],
    [0.5, 0.5],
    [0.4, 0.4],
    [0.6, 0.6],
    [0.9, 0.2],
    [0.4, 0],
    [0.3, 0],
    [0.95, 0],
    [0.6, 0],
    [0.3, 0],
    [0.1, 0],
  ]);

  it("reads score channel 4 and keypoint triples from channel 5", () => {
    const candidates = decodePoses({ primary }, options({ keypointCount: 2 }));
    expect(candidates).toHaveLength(1);
    const [pose] = candidates;
    expect(pose.classIndex).toBe(0);
    expect(pose.score).toBe(0.9);
    expect(pose.keypoints.space).toBe("normalized");
    expect(pose.keypoints.points).toEqual([
      { x: 0.4, y: 0.3, confidence: 0.95 },
      { x: 0.6, y: 0.3, confidence: 0.1 },
    ]);
  });

  it("scales keypoints given in model pixels", () => {
    const pixels = channelTensor([[100], [50], [40], [60], [0.9], [80], [30], [0.95], [120], [30], [0.1]]);
    const [pose] = decodePoses({ primary: pixels }, options({ keypointCount: 2, outputCoordinates: "model", targetSize: [200, 100] }));
    expect(pose.keypoints.points[0].x).toBeCloseTo(0.4, 10);
    expect(pose.keypoints.points[0].y).toBeCloseTo(0.3, 10);
    expect(pose.keypoints.points[0].confidence).toBe(0.95);
  });

  it("checks the channel count against the keypoint count", () => {
    expect(() => decodePoses({ primary }, options())).toThrow(ShapeMismatchError);
  });
});

describe("decodeOrientedBoxes", () => {
  it("reads the best class and the trailing angle", () => {
    const primary = channelTensor([[0.5], [0.5], [0.4], [0.2], [0.1], [0.7], [0.3]]);
    const [candidate] = decodeOrientedBoxes({ primary }, options({ labels: ["plane", "ship"] }));
    expect(candidate.classIndex).toBe(1);
    expect(candidate.score).toBe(0.7);
    expect(candidate.box).toEqual({
      kind: "oriented",
      space: "normalized",
      centerX: 0.5,
      centerY: 0.5,
      width: 0.4,
      height: 0.2,
      angle: 0.3,
    });
  });
});

describe("rankClassScores", () => {
  it("ranks scores in descending order", () => {
    const ranked = rankClassScores({ primary: { data: [0.1, 0.7, 0.2], dims: [1, 3] } }, {});
    expect(ranked).toEqual([
      { index: 1, score: 0.7 },
      { index: 2, score: 0.2 },
      { index: 0, score: 0.1 },
    ]);
  });

  it("keeps class order on ties and puts NaN last", () => {
    const ranked = rankClassScores({ primary: { data: [Number.NaN, 0.5, 0.5], dims: [3] } }, {});
    expect(ranked.map((s) => s.index)).toEqual([1, 2, 0]);
  });

  it("applies softmax to logits in auto mode only", () => {
    const logits = { primary: { data: [2, 1, 0], dims: [1, 3] } };
    const probabilities = rankClassScores(logits, { applySoftmax: "auto" });
    expect(probabilities.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(probabilities.reduce((sum, s) => sum + s.score, 0)).toBeCloseTo(1, 10);
    expect(probabilities[0].score).toBeCloseTo(softmax([2, 1, 0])[0], 12);

    const scores = rankClassScores({ primary: { data: [0.1, 0.7, 0.2], dims: [3] } }, { applySoftmax: "auto" });
    expect(scores[0].score).toBe(0.7);
  });

  it("gives NaN logits no weight under softmax", () => {
    const e2 = Math.exp(2);
    const [nan, high, low] = softmax([Number.NaN, 2, 0]);
    expect(nan).toBe(0);
    expect(high).toBeCloseTo(e2 / (e2 + 1), 12);
    expect(low).toBeCloseTo(1 / (e2 + 1), 12);

    const ranked = rankClassScores({ primary: { data: [Number.NaN, 2, 0], dims: [3] } }, { applySoftmax: true });
    expect(ranked.map((s) => s.index)).toEqual([1, 2, 0]);
    expect(ranked.every((s) => !Number.isNaN(s.score))).toBe(true);
  });

  it("rejects a spatial tensor", () => {
    expect(() => rankClassScores({ primary: detectTensor }, {})).toThrow(ShapeMismatchError);
  });
});

describe("decoder table", () => {
  it("maps every task to its decoder and suppression policy", () => {
    expect(decoders.detect.policy).toBe("per-class");
    expect(decoders.segment.policy).toBe("per-class");
    expect(decoders.obb.policy).toBe("per-class");
    expect(decoders.pose.policy).toBe("class-agnostic");
    expect(decoders.classify.policy).toBeNull();
    expect(Object.entries(decoders).every(([task, decoder]) => decoder.task === task)).toBe(true);
  });
});
