import * as ort from 'onnxruntime-node';
import type { RuntimeOutputs, SessionOptions } from '../types/runtime';
import { logger } from '../utils/logger';
import { BaseProvider } from './base-provider';

export class NodeRuntimeProvider extends BaseProvider<ort.InferenceSession> {
  readonly type = 'node';

  protected open(modelPath: string, options: SessionOptions): Promise<ort.InferenceSession> {
    return ort.InferenceSession.create(modelPath, {
      executionProviders: ['cpu'],
      graphOptimizationLevel: 'all',
      enableCpuMemArena: options.enableCpuMemArena,
      enableMemPattern: options.enableMemPattern,
      executionMode: 'sequential',
    });
  }

  private disposeTensor(tensor: ort.Tensor) {
    try {
      tensor.dispose();
    } catch (error: unknown) {
      logger.error('Error disposing tensor:', error);
    }
  }

  protected async execute(
    session: ort.InferenceSession,
    inputName: string,
    input: Float32Array,
    dims: readonly number[],
  ): Promise<RuntimeOutputs> {
    const tensor = new ort.Tensor('float32', input, dims);
    try {
      return await session.run({ [inputName]: tensor });
    } finally {
      // Dispose input tensors immediately
      this.disposeTensor(tensor);
    }
  }
}
