import sharp from 'sharp';
import type { FrameInfo, PreprocessResult, Rotation } from '../../types';
import { ConfigurationError } from '../errors';

const CHANNELS = 3;

interface ProcessedImage {
  data: Float32Array;
  frame: FrameInfo;
}

async function processImageToTensor(
  imageBuffer: Buffer,
  targetSize: [number, number],
  rotation: Rotation,
  inputShape: 'NCHW' | 'NHWC',
): Promise<ProcessedImage> {
  const metadata = await sharp(imageBuffer).metadata();
  if (!metadata.width || !metadata.height) {
    throw new ConfigurationError('Failed to get image dimensions');
  }

  let processedImage = sharp(imageBuffer, {
    failOnError: false,
    sequentialRead: true,
  });

  // sharp turns clockwise, same direction as Rotation
  if (rotation !== 0) {
    processedImage = processedImage.rotate(rotation);
  }

  processedImage = processedImage.resize(targetSize[0], targetSize[1], {
    fit: 'fill',
    kernel: 'lanczos3',
  });

  const { data: buffer, info } = await processedImage
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = info;
  if (channels !== CHANNELS) {
    throw new ConfigurationError(`Expected ${CHANNELS} channels after preprocessing, got ${channels}`);
  }
  const pixelCount = height * width;
  const data = new Float32Array(channels * height * width);

  for (let i = 0; i < pixelCount; i++) {
    for (let c = 0; c < channels; c++) {
      const srcIdx = i * channels + c;
      // NHWC: [batch, height, width, channels], NCHW: [batch, channels, height, width] (기본값)
      const dstIdx = inputShape === 'NHWC' ? i * channels + c : c * pixelCount + i;
      data[dstIdx] = buffer[srcIdx] / 255.0;
    }
  }

  return {
    data,
    frame: { originalWidth: metadata.width, originalHeight: metadata.height, rotation },
  };
}

/**
 * Decodes, rotates and resizes each image into one batched float tensor.
 * Frame sizes are those of the images as given, before rotation.
 */
export async function preprocess(
  imageBuffers: Buffer[],
  targetSize: [number, number],
  rotation: Rotation = 0,
  inputShape: 'NCHW' | 'NHWC' = 'NCHW',
): Promise<PreprocessResult> {
  const results = await Promise.all(
    imageBuffers.map((buffer) => processImageToTensor(buffer, targetSize, rotation, inputShape)),
  );

  const imageSize = CHANNELS * targetSize[1] * targetSize[0];
  const inputTensor = new Float32Array(results.length * imageSize);

  results.forEach(({ data }, i) => {
    inputTensor.set(data, i * imageSize);
  });

  return {
    inputTensor,
    frames: results.map((r) => r.frame),
  };
}
