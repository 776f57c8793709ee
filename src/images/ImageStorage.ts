/**
 * ImageStorage - Writes downloaded photos as JPEG files
 *
 * Every image is re-encoded with sharp, optionally converted to grayscale,
 * and stored under `<basePath>/<subdirectory>/<NNNNN>.jpg`.
 */

import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ImageStorage');

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ImageStorageConfig {
  /** Base path for storing images (supports ~ for home directory) */
  basePath: string;
}

export interface SavedImage {
  /** Absolute path to the saved image */
  absolutePath: string;
  /** Relative path from base directory */
  relativePath: string;
  /** File size in bytes */
  sizeBytes: number;
  grayscale: boolean;
}

/**
 * Five-digit, 1-based file name: 1 -> "00001.jpg"
 */
export function imageFilename(index: number): string {
  return `${String(index).padStart(5, '0')}.jpg`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// IMAGE STORAGE
// ═══════════════════════════════════════════════════════════════════════════════

export class ImageStorage {
  private basePath: string;

  constructor(config: ImageStorageConfig) {
    this.basePath = path.resolve(config.basePath.replace(/^~/, process.env.HOME || ''));

    logger.debug('ImageStorage initialized', { basePath: this.basePath });
  }

  /**
   * Create the given subdirectories under the base path
   */
  async initialize(subdirectories: string[] = []): Promise<void> {
    for (const dir of ['', ...subdirectories]) {
      await fs.mkdir(path.join(this.basePath, dir), { recursive: true });
    }
    logger.debug('Storage directories created/verified', { basePath: this.basePath, subdirectories });
  }

  /**
   * Re-encode an image buffer as JPEG and write it
   *
   * @param relativePath - Target path below the base path, e.g. "color/00001.jpg"
   */
  async saveJpeg(buffer: Buffer, relativePath: string, grayscale: boolean = false): Promise<SavedImage> {
    const absolutePath = path.join(this.basePath, relativePath);

    try {
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });

      let image = sharp(buffer);
      if (grayscale) {
        // single-channel JPEG rather than three identical channels
        image = image.grayscale().toColourspace('b-w');
      }
      const info = await image.jpeg().toFile(absolutePath);

      logger.debug('Image saved', { absolutePath, sizeBytes: info.size, grayscale });

      return {
        absolutePath,
        relativePath,
        sizeBytes: info.size,
        grayscale
      };
    } catch (error) {
      logger.error('Failed to save image', {
        error: error instanceof Error ? error.message : String(error),
        absolutePath
      });
      throw error;
    }
  }

  getBasePath(): string {
    return this.basePath;
  }
}

export default ImageStorage;
