import axios from 'axios';
import fs from 'node:fs';
import path from 'node:path';
import { ModelLoadError } from './errors';
import { logger } from './logger';

const COMMON_DIRS = [
  'models',
  'public',
  'static',
  'assets',
  'src/assets',
  '', // project root as fallback
];

export function isRemoteModel(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Absolute paths pass through; relative ones are looked up in the usual asset
 * directories under cwd.
 */
export function resolveModelPath(modelPath: string, cwd: string = process.cwd()): string {
  if (path.isAbsolute(modelPath)) {
    return modelPath;
  }

  for (const dir of COMMON_DIRS) {
    const tryPath = dir ? path.join(cwd, dir, modelPath) : path.join(cwd, modelPath);
    if (fs.existsSync(tryPath)) {
      return tryPath;
    }
  }

  return modelPath;
}

/** Cache file name for a model URL: last path segment, `.onnx` when it has none */
export function cacheFileName(url: string): string {
  const { pathname } = new URL(url);
  const base = path.basename(pathname) || 'model';
  return path.extname(base) ? base : `${base}.onnx`;
}

/**
 * Downloads a remote model once into `cacheDir` and returns the local path.
 */
export async function downloadModel(url: string, cacheDir: string): Promise<string> {
  const filePath = path.join(cacheDir, cacheFileName(url));
  if (fs.existsSync(filePath)) {
    return filePath;
  }

  logger.info(`Downloading model ${url}`);
  try {
    const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    await fs.promises.mkdir(cacheDir, { recursive: true });
    await fs.promises.writeFile(filePath, Buffer.from(response.data));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`Failed to download model from ${url}: ${reason}`, error);
  }
  return filePath;
}

/**
 * Local path for a model given as a path or an http(s) URL.
 */
export async function resolveModelSource(source: string, cacheDir: string): Promise<string> {
  if (isRemoteModel(source)) {
    return downloadModel(source, cacheDir);
  }
  const resolved = resolveModelPath(source);
  if (!fs.existsSync(resolved)) {
    throw new ModelLoadError(`Model file not found: ${source}`);
  }
  return resolved;
}
