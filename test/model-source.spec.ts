import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { cacheFileName, downloadModel, isRemoteModel, resolveModelPath, resolveModelSource } from "../src/utils/model-source";
import { ModelLoadError } from "../src/utils/errors";

const http = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("axios", () => ({ default: { get: http.get } }));

describe("model sources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "yolo-decode-models-"));
    http.get.mockReset();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("tells URLs from paths", () => {
    expect(isRemoteModel("https://example.com/model.onnx")).toBe(true);
    expect(isRemoteModel("HTTP://example.com/model.onnx")).toBe(true);
    expect(isRemoteModel("models/model.onnx")).toBe(false);
  });

  it("names cache files after the last path segment", () => {
    expect(cacheFileName("https://example.com/weights/yolo-seg.onnx?v=2")).toBe("yolo-seg.onnx");
    expect(cacheFileName("https://example.com/weights/latest")).toBe("latest.onnx");
  });

  it("looks for relative paths in the usual directories", async () => {
    await fs.mkdir(path.join(dir, "models"));
    await fs.writeFile(path.join(dir, "models", "detect.onnx"), "x");

    expect(resolveModelPath("detect.onnx", dir)).toBe(path.join(dir, "models", "detect.onnx"));
    expect(resolveModelPath("other.onnx", dir)).toBe("other.onnx");
    expect(resolveModelPath("/abs/detect.onnx", dir)).toBe("/abs/detect.onnx");
  });

  it("downloads a model once into the cache directory", async () => {
    http.get.mockResolvedValue({ data: Uint8Array.from([1, 2, 3]).buffer });
    const cacheDir = path.join(dir, "cache");

    const first = await downloadModel("https://example.com/weights/latest", cacheDir);
    const second = await downloadModel("https://example.com/weights/latest", cacheDir);

    expect(first).toBe(path.join(cacheDir, "latest.onnx"));
    expect(second).toBe(first);
    expect(http.get).toHaveBeenCalledTimes(1);
    expect(http.get).toHaveBeenCalledWith("https://example.com/weights/latest", { responseType: "arraybuffer" });
    expect([...(await fs.readFile(first))]).toEqual([1, 2, 3]);
  });

  it("reports download failures as ModelLoadError", async () => {
    http.get.mockRejectedValue(new Error("offline"));
    await expect(downloadModel("https://example.com/m.onnx", dir)).rejects.toThrow(
      "Failed to download model from https://example.com/m.onnx: offline",
    );
  });

  it("resolves a URL through the cache and rejects a missing file", async () => {
    http.get.mockResolvedValue({ data: Uint8Array.from([7]).buffer });
    await expect(resolveModelSource("https://example.com/a.onnx", dir)).resolves.toBe(path.join(dir, "a.onnx"));
    await expect(resolveModelSource(path.join(dir, "missing.onnx"), dir)).rejects.toThrow(ModelLoadError);
  });
});
