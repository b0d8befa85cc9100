import sharp from 'sharp';
import type { ImageSize } from '../pipeline/types.js';

/** Reads pixel dimensions from the image header. */
export async function readImageSize(imagePath: string): Promise<ImageSize> {
  const metadata = await sharp(imagePath).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error(`Unable to read dimensions of ${imagePath}`);
  }
  return { width: metadata.width, height: metadata.height };
}
