import path from "node:path";
import { preprocess } from "./utils/preprocessing/imagePreprocess";
import { decode } from "./utils/process";
import { ThresholdStore, validateThresholds } from "./utils/config";
import { ConfigurationError, ShapeMismatchError } from "./utils/errors";
import { FrameTimer } from "./utils/timing";
import type { Clock } from "./utils/timing";
import { encodeMaskPng } from "./utils/mask-image";
import { resolveModelSource } from "./utils/model-source";
import { batchSize, sliceBatch } from "./utils/tensor";
import { logger } from "./utils/logger";
import { NodeRuntimeProvider } from "./runtime/node-provider";
import { WebRuntimeProvider } from "./runtime/web-provider";
import { OrtSessionManager } from "./runtime/session-manager";
import type { SessionStats } from "./runtime/session-manager";
import type { DecodeOptions, FrameInfo, RawOutput, RawTensor, Rotation, TaskKind, TaskOptions, Thresholds } from "./types";
import type { ResultByTask } from "./types/results";
import type { RuntimeOutputs, RuntimeProvider, RuntimeSession, RuntimeTensor, RuntimeType, SessionOptions } from "./types/runtime";

const DEFAULT_TARGET_SIZE: [number, number] = [640, 640];

// Unbatched rank of the primary output per task
const PRIMARY_RANK: Record<TaskKind, number> = {
	detect: 2,
	segment: 2,
	pose: 2,
	obb: 2,
	classify: 1,
};

// Mask prototypes without a batch axis: [channels, height, width]
const PROTOTYPE_RANK = 3;

type Finisher<K extends TaskKind> = (result: ResultByTask[K]) => Promise<ResultByTask[K]>;

const keep = async <R>(result: R): Promise<R> => result;

const maskEncoders: { [K in TaskKind]: Finisher<K> } = {
	detect: keep,
	segment: async (result) => {
		if (!result.masks) return result;
		const png = await encodeMaskPng(result.masks.combinedMask);
		return Object.freeze({ ...result, masks: Object.freeze({ ...result.masks, png }) });
	},
	pose: keep,
	obb: keep,
	classify: keep,
};

function toRawTensor(name: string, tensor: RuntimeTensor): RawTensor {
	if (!(tensor.data instanceof Float32Array)) {
		throw new ConfigurationError(`Output ${name} must be float32, got ${tensor.type}`);
	}
	return { data: tensor.data, dims: tensor.dims };
}

function disposeAll(outputs: RuntimeOutputs): void {
	for (const tensor of Object.values(outputs)) {
		try {
			tensor.dispose();
		} catch (error: unknown) {
			logger.error("Error disposing tensor:", error);
		}
	}
}

class TaskBuilder<T extends TaskKind> {
	private inputs: Buffer[] = [];
	private modelPath = "";
	private options: TaskOptions = {};
	private shouldEncodeMasks = false;
	private static MAX_BATCH_SIZE = 32;
	private memoryOptions: SessionOptions = {
		enableCpuMemArena: true,
		enableMemPattern: true,
	};

	constructor(
		private readonly task: T,
		private readonly yolo: YoloDecode,
	) {}

	withOptions(options: TaskOptions): TaskBuilder<T> {
		validateThresholds(options);
		this.options = { ...this.options, ...options };
		return this;
	}

	withMemoryOptions(options: Partial<SessionOptions>): TaskBuilder<T> {
		this.memoryOptions = {
			...this.memoryOptions,
			...options,
		};
		return this;
	}

	/** Clockwise rotation applied to every input before inference */
	withRotation(rotation: Rotation): TaskBuilder<T> {
		this.options.rotation = rotation;
		return this;
	}

	in(inputs: Buffer[]): TaskBuilder<T> {
		this.inputs = inputs;
		return this;
	}

	using(modelPath: string): TaskBuilder<T> {
		this.modelPath = modelPath;
		return this;
	}

	/** Adds a PNG of the combined mask to segment results */
	andEncodeMasks(): TaskBuilder<T> {
		this.shouldEncodeMasks = true;
		return this;
	}

	private targetSize(): [number, number] {
		return this.options.targetSize ?? DEFAULT_TARGET_SIZE;
	}

	private decodeOptions(): DecodeOptions {
		// one read per call, later updates apply to the next call
		const thresholds: Thresholds = this.yolo.thresholds.snapshot(this.task);
		const o = this.options;
		return {
			confidenceThreshold: o.confidenceThreshold ?? thresholds.confidenceThreshold,
			iouThreshold: o.iouThreshold ?? thresholds.iouThreshold,
			maxDetections: o.maxDetections ?? thresholds.maxDetections,
			labels: o.labels ?? [],
			numClasses: o.numClasses,
			keypointCount: o.keypointCount,
			maskThreshold: o.maskThreshold,
			protoLayout: o.protoLayout ?? "NCHW",
			// ONNX exports emit boxes in model input pixels
			outputCoordinates: o.outputCoordinates ?? "model",
			targetSize: this.targetSize(),
			applySoftmax: o.applySoftmax,
		};
	}

	private rawOutput(session: RuntimeSession, outputs: RuntimeOutputs): RawOutput {
		const [primaryName, prototypeName] = session.outputNames;
		const primary = outputs[primaryName];
		if (!primary) {
			throw new ShapeMismatchError(this.task, "at least one output tensor", []);
		}
		if (this.task !== "segment") {
			return { primary: toRawTensor(primaryName, primary) };
		}
		const prototype = prototypeName === undefined ? undefined : outputs[prototypeName];
		return {
			primary: toRawTensor(primaryName, primary),
			prototype: prototype ? toRawTensor(prototypeName, prototype) : undefined,
		};
	}

	private decodeBatch(
		session: RuntimeSession,
		outputs: RuntimeOutputs,
		frames: FrameInfo[],
		options: DecodeOptions,
		startedAt: number,
	): ResultByTask[T][] {
		try {
			const output = this.rawOutput(session, outputs);
			const batch = batchSize(output.primary, PRIMARY_RANK[this.task]);
			if (batch !== frames.length) {
				throw new ShapeMismatchError(this.task, `a batch of ${frames.length}`, output.primary.dims);
			}

			return frames.map((frame, i) =>
				decode(
					this.task,
					{
						primary: sliceBatch(output.primary, i, PRIMARY_RANK[this.task]),
						prototype: output.prototype && sliceBatch(output.prototype, i, PROTOTYPE_RANK),
					},
					options,
					{ frame, timer: this.yolo.timer, startedAt },
				),
			);
		} finally {
			// Dispose all tensors in results
			disposeAll(outputs);
		}
	}

	private async processBatch(
		session: RuntimeSession,
		startIdx: number,
		count: number,
		options: DecodeOptions,
	): Promise<ResultByTask[T][]> {
		const startedAt = this.yolo.timer.now();
		const [targetWidth, targetHeight] = this.targetSize();
		const inputShape = this.options.inputShape ?? "NCHW";

		const { inputTensor, frames } = await preprocess(
			this.inputs.slice(startIdx, startIdx + count),
			[targetWidth, targetHeight],
			this.options.rotation ?? 0,
			inputShape,
		);
		const dims = inputShape === "NHWC"
			? [count, targetHeight, targetWidth, 3]
			: [count, 3, targetHeight, targetWidth];

		const outputs = await session.run(inputTensor, dims);
		const decoded = this.decodeBatch(session, outputs, frames, options, startedAt);

		if (!this.shouldEncodeMasks) {
			return decoded;
		}
		const encode: Finisher<T> = maskEncoders[this.task];
		return Promise.all(decoded.map((result) => encode(result)));
	}

	async now(): Promise<ResultByTask[T][]> {
		if (!this.inputs.length) {
			throw new ConfigurationError("No inputs provided. Call in() first.");
		}
		if (!this.modelPath) {
			throw new ConfigurationError("No model path provided. Call using() first.");
		}

		const resolvedModelPath = await resolveModelSource(this.modelPath, this.yolo.modelCacheDir);
		const session = await this.yolo.sessions.acquire(resolvedModelPath, this.memoryOptions);
		const options = this.decodeOptions();
		const results: ResultByTask[T][] = [];

		const totalInputs = this.inputs.length;
		for (let i = 0; i < totalInputs; i += TaskBuilder.MAX_BATCH_SIZE) {
			const count = Math.min(TaskBuilder.MAX_BATCH_SIZE, totalInputs - i);
			results.push(...(await this.processBatch(session, i, count, options)));
		}
		return results;
	}
}

export interface YoloDecodeOptions {
	maxSessions?: number;
	maxMemoryMB?: number;
	/** Where models given as URLs are downloaded to */
	modelCacheDir?: string;
	thresholds?: Partial<Thresholds>;
	/** Clock of the FPS timer, `performance.now` by default */
	clock?: Clock;
	/** Replaces the ONNX Runtime provider picked by `runtime` */
	provider?: RuntimeProvider;
}

export default class YoloDecode {
	private static readonly DEFAULT_MAX_SESSIONS = 5;
	private static readonly DEFAULT_MAX_MEMORY_MB = 1024; // 1GB

	readonly sessions: OrtSessionManager;
	readonly thresholds: ThresholdStore;
	readonly timer: FrameTimer;
	readonly modelCacheDir: string;
	private readonly runtime: RuntimeType;

	constructor(runtime: RuntimeType = "node", options: YoloDecodeOptions = {}) {
		const provider = options.provider
			?? (runtime === "node" ? new NodeRuntimeProvider() : new WebRuntimeProvider());
		this.runtime = provider.type;
		this.sessions = new OrtSessionManager(provider, {
			maxSessions: options.maxSessions ?? YoloDecode.DEFAULT_MAX_SESSIONS,
			maxMemoryMB: options.maxMemoryMB ?? YoloDecode.DEFAULT_MAX_MEMORY_MB,
		});
		this.thresholds = new ThresholdStore(options.thresholds);
		this.timer = new FrameTimer(options.clock);
		this.modelCacheDir = options.modelCacheDir ?? path.join(process.cwd(), "models");
	}

	public getRuntime(): RuntimeType {
		return this.runtime;
	}

	public getSessionStats(): SessionStats {
		return this.sessions.stats();
	}

	public async releaseAllSessions(): Promise<void> {
		await this.sessions.releaseAll();
	}

	detect(labels: string[]): TaskBuilder<"detect"> {
		return new TaskBuilder("detect", this).withOptions({ labels });
	}

	segment(labels: string[]): TaskBuilder<"segment"> {
		return new TaskBuilder("segment", this).withOptions({ labels });
	}

	pose(labels: string[] = ["person"]): TaskBuilder<"pose"> {
		return new TaskBuilder("pose", this).withOptions({ labels });
	}

	obb(labels: string[]): TaskBuilder<"obb"> {
		return new TaskBuilder("obb", this).withOptions({ labels });
	}

	classify(labels: string[]): TaskBuilder<"classify"> {
		return new TaskBuilder("classify", this).withOptions({ labels });
	}
}

export { YoloDecode, TaskBuilder };
export { decode, decoders } from "./utils/process";
export type { DecodeContext } from "./utils/process";
export * from "./utils/geometry";
export * from "./utils/coordinates";
export { suppress, nonMaxSuppression, sortByScore } from "./utils/nms";
export type { SuppressOptions } from "./utils/nms";
export { assembleMasks, prototypeView, DEFAULT_MASK_THRESHOLD } from "./utils/postprocessing/masks";
export { encodeMaskPng } from "./utils/mask-image";
export { skeletonLimbs, visibleKeypoints } from "./utils/skeleton";
export { formatResult, labelFor, UNKNOWN_LABEL } from "./utils/formatters/resultFormatter";
export { FrameTimer, SMOOTHING_FACTOR } from "./utils/timing";
export { ThresholdStore, defaultThresholds, loadEnvConfig, loadDotenv } from "./utils/config";
export { logger, setLogLevel, getLogLevel } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
export * from "./utils/errors";
export * from "./constants/palette";
export * from "./types";
export * from "./types/geometry";
export * from "./types/results";
export * from "./types/runtime";
