import type { RuntimeOutputs, RuntimeProvider, RuntimeSession, RuntimeType, SessionOptions } from '../types/runtime';
import { ModelLoadError } from '../utils/errors';
import { logger } from '../utils/logger';

/** What both ONNX Runtime flavours expose on an inference session */
export interface OrtSessionLike {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  release(): Promise<void>;
}

export abstract class BaseProvider<S extends OrtSessionLike> implements RuntimeProvider {
  abstract readonly type: RuntimeType;

  protected abstract open(modelPath: string, options: SessionOptions): Promise<S>;

  protected abstract execute(
    session: S,
    inputName: string,
    input: Float32Array,
    dims: readonly number[],
  ): Promise<RuntimeOutputs>;

  async createSession(modelPath: string, options: SessionOptions): Promise<RuntimeSession> {
    let session: S;
    try {
      session = await this.open(modelPath, options);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ModelLoadError(`Failed to load model ${modelPath}: ${reason}`, error);
    }

    const [inputName] = session.inputNames;
    if (inputName === undefined) {
      await session.release();
      throw new ModelLoadError(`Model ${modelPath} declares no inputs`);
    }
    logger.debug(`${this.type} session for ${modelPath}: inputs ${session.inputNames.join(', ')}, outputs ${session.outputNames.join(', ')}`);

    return {
      inputNames: session.inputNames,
      outputNames: session.outputNames,
      run: (input, dims) => this.execute(session, inputName, input, dims),
      release: async () => {
        try {
          await session.release();
        } catch (error: unknown) {
          logger.error('Error releasing session:', error);
          throw error;
        }
      },
    };
  }
}
