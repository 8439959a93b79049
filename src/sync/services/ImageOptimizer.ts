import sharp from 'sharp';
import { CompressionFailedError, InvalidDataError } from '@/lib/errors';
import { SYNC_CONFIG } from '../types';

export interface OptimizeOptions {
  maxDimension: number;
  targetSizeBytes: number;
}

/**
 * Turns arbitrary image bytes into a JPEG that fits the upload limits.
 */
export interface ImageOptimizer {
  optimize(input: Buffer, options: OptimizeOptions): Promise<Buffer>;
}

// Quality ladder: the first step must meet the target size, later steps only the hard ceiling
const QUALITY_STEPS: { quality: number; limit: 'target' | 'ceiling' }[] = [
  { quality: 80, limit: 'target' },
  { quality: 60, limit: 'ceiling' },
  { quality: 40, limit: 'ceiling' },
];

export class SharpImageOptimizer implements ImageOptimizer {
  constructor(private readonly maxBytes: number = SYNC_CONFIG.MAX_IMAGE_BYTES) {}

  async optimize(input: Buffer, options: OptimizeOptions): Promise<Buffer> {
    let resized: Buffer;
    try {
      resized = await sharp(input)
        .rotate()
        .resize({
          width: options.maxDimension,
          height: options.maxDimension,
          fit: 'inside',
          withoutEnlargement: true,
        })
        .toBuffer();
    } catch (error) {
      throw new InvalidDataError('Invalid image data', { cause: error });
    }

    for (const step of QUALITY_STEPS) {
      const encoded = await sharp(resized).jpeg({ quality: step.quality, mozjpeg: true }).toBuffer();
      const limit = step.limit === 'target' ? options.targetSizeBytes : this.maxBytes;
      if (encoded.length <= limit) {
        return encoded;
      }
    }

    throw new CompressionFailedError();
  }
}
