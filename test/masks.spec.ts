import { describe, it, expect } from "vitest";
import type { RawTensor } from "../src/types";
import { CLASS_PALETTE } from "../src/constants/palette";
import { assembleMasks, prototypeView } from "../src/utils/postprocessing/masks";
import { ShapeMismatchError } from "../src/utils/errors";

// 2x2 prototypes with 2 channels: (0,0)=[1,0] (0,1)=[0,1] (1,0)=[1,1] (1,1)=[0,0]
const nhwc: RawTensor = { data: [1, 0, 0, 1, 1, 1, 0, 0], dims: [1, 2, 2, 2] };

describe("prototypeView", () => {
  it("reads NHWC and NCHW layouts", () => {
    const tensor: RawTensor = { data: [1, 2, 3, 4, 5, 6, 7, 8], dims: [2, 2, 2] };
    expect(prototypeView(tensor, "NHWC").at(1, 0, 1)).toBe(6);
    expect(prototypeView(tensor, "NCHW").at(1, 0, 1)).toBe(7);
  });

  it("needs a rank 3 tensor after the batch dimension", () => {
    expect(() => prototypeView({ data: [1, 2, 3, 4], dims: [4] }, "NHWC")).toThrow(ShapeMismatchError);
  });
});

describe("assembleMasks", () => {
  const proto = prototypeView(nhwc, "NHWC");

  it("returns nulls for no detections", () => {
    expect(assembleMasks([], proto)).toEqual({ probabilityMasks: null, combinedMask: null });
  });

  it("computes one raw mask per detection as a per-pixel dot product", () => {
    const { probabilityMasks } = assembleMasks(
      [
        { classIndex: 0, maskCoeffs: Float32Array.from([1, 0]) },
        { classIndex: 1, maskCoeffs: Float32Array.from([0, 0.5]) },
      ],
      proto,
    );
    expect(probabilityMasks).toHaveLength(2);
    expect(probabilityMasks?.[0].map((row) => Array.from(row))).toEqual([
      [1, 0],
      [1, 0],
    ]);
    expect(probabilityMasks?.[1].map((row) => Array.from(row))).toEqual([
      [0, 0.5],
      [0.5, 0],
    ]);
  });

  it("paints pixels above the threshold and lets later detections win", () => {
    const { combinedMask } = assembleMasks(
      [
        { classIndex: 0, maskCoeffs: Float32Array.from([1, 0]) },
        { classIndex: 1, maskCoeffs: Float32Array.from([0, 0.75]) },
      ],
      proto,
    );
    expect(combinedMask?.width).toBe(2);
    expect(combinedMask?.height).toBe(2);
    expect(Array.from(combinedMask?.data ?? [])).toEqual([
      ...CLASS_PALETTE[0],
      ...CLASS_PALETTE[1],
      ...CLASS_PALETTE[1],
      0, 0, 0, 0,
    ]);
  });

  it("leaves a value equal to the threshold transparent", () => {
    const { combinedMask } = assembleMasks([{ classIndex: 0, maskCoeffs: Float32Array.from([0.5, 0]) }], proto);
    expect(Array.from(combinedMask?.data ?? [])).toEqual(new Array(16).fill(0));
  });

  it("takes the threshold and palette from the options", () => {
    const { combinedMask } = assembleMasks([{ classIndex: 3, maskCoeffs: Float32Array.from([0.5, 0]) }], proto, {
      threshold: 0.25,
      palette: [[9, 8, 7, 6]],
    });
    expect(Array.from(combinedMask?.data ?? []).slice(0, 8)).toEqual([9, 8, 7, 6, 0, 0, 0, 0]);
  });

  it("rejects coefficients that do not match the prototype channels", () => {
    expect(() => assembleMasks([{ classIndex: 0, maskCoeffs: new Float32Array(3) }], proto)).toThrow(
      ShapeMismatchError,
    );
  });
});
