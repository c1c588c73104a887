import { InferenceSession, Tensor, env } from 'onnxruntime-web';
import type { RuntimeOutputs, SessionOptions } from '../types/runtime';
import { BaseProvider } from './base-provider';

export class WebRuntimeProvider extends BaseProvider<InferenceSession> {
  readonly type = 'web';

  protected open(modelPath: string, options: SessionOptions): Promise<InferenceSession> {
    env.wasm.numThreads = 1;

    return InferenceSession.create(modelPath, {
      executionProviders: ['wasm'],
      graphOptimizationLevel: 'all',
      enableCpuMemArena: options.enableCpuMemArena,
      enableMemPattern: options.enableMemPattern,
    });
  }

  protected async execute(
    session: InferenceSession,
    inputName: string,
    input: Float32Array,
    dims: readonly number[],
  ): Promise<RuntimeOutputs> {
    const tensor = new Tensor('float32', input, dims);
    try {
      return await session.run({ [inputName]: tensor });
    } finally {
      tensor.dispose();
    }
  }
}
