import { describe, it, expect } from "vitest";
import type { KeypointSet } from "../src/types/geometry";
import { POSE_PALETTE, classColor, CLASS_PALETTE } from "../src/constants/palette";
import { skeletonLimbs, visibleKeypoints } from "../src/utils/skeleton";

function person(confidences: number[]): KeypointSet {
  return {
    space: "pixel",
    points: confidences.map((confidence, i) => ({ x: i * 10, y: i, confidence })),
  };
}

describe("skeletonLimbs", () => {
  it("skips limbs with a low-confidence end", () => {
    const confidences = new Array<number>(17).fill(0.9);
    confidences[13] = 0.1;
    const limbs = skeletonLimbs(person(confidences));

    expect(limbs).toHaveLength(17);
    expect(limbs[0]).toEqual({ from: { x: 160, y: 16 }, to: { x: 140, y: 14 }, color: POSE_PALETTE[0] });
  });

  it("ignores pairs past the end of a short set", () => {
    expect(skeletonLimbs(person([0.9, 0.9, 0.9]))).toHaveLength(3);
  });
});

describe("visibleKeypoints", () => {
  it("keeps points at or above the confidence and colors them", () => {
    const points = visibleKeypoints(person([0.25, 0.2, 0.9]));
    expect(points).toEqual([
      { index: 0, x: 0, y: 0, color: POSE_PALETTE[16] },
      { index: 2, x: 20, y: 2, color: POSE_PALETTE[16] },
    ]);
  });
});

describe("classColor", () => {
  it("wraps around the palette", () => {
    expect(classColor(CLASS_PALETTE.length + 1)).toEqual(CLASS_PALETTE[1]);
    expect(classColor(-1)).toEqual(CLASS_PALETTE[CLASS_PALETTE.length - 1]);
  });
});
