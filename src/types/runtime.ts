export type RuntimeType = 'node' | 'web';

/**
 * Output tensor as an ONNX Runtime session returns it. Both onnxruntime-node
 * and onnxruntime-web tensors fit this shape.
 */
export interface RuntimeTensor {
  readonly type: string;
  readonly data: unknown;
  readonly dims: readonly number[];
  dispose(): void;
}

export type RuntimeOutputs = { readonly [name: string]: RuntimeTensor };

export interface SessionOptions {
  enableCpuMemArena: boolean;
  enableMemPattern: boolean;
}

/**
 * An open model. `run` feeds one float32 tensor to the first model input; the
 * caller owns (and disposes) the returned tensors.
 */
export interface RuntimeSession {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(input: Float32Array, dims: readonly number[]): Promise<RuntimeOutputs>;
  release(): Promise<void>;
}

export interface RuntimeProvider {
  readonly type: RuntimeType;
  createSession(modelPath: string, options: SessionOptions): Promise<RuntimeSession>;
}
