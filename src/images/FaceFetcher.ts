/**
 * FaceFetcher - Downloads generated face photos for people in the tree
 *
 * Each index gets two independent requests to the face service: the first
 * image is kept in colour, the second is converted to grayscale.
 * Files land in `<outputDir>/color/NNNNN.jpg` and `<outputDir>/grayscale/NNNNN.jpg`.
 */

import type { FaceConfig } from '../utils/config.js';
import errorHandler from '../utils/ErrorHandler.js';
import { createLogger } from '../utils/logger.js';
import { downloadBuffer } from './download.js';
import { ImageStorage, imageFilename, type SavedImage } from './ImageStorage.js';

const logger = createLogger('FaceFetcher');

const SERVICE_NAME = 'FaceService';

export interface FacePair {
  index: number;
  color: SavedImage;
  grayscale: SavedImage;
}

export interface FaceFetchResult {
  pairs: FacePair[];
  outputDir: string;
}

export class FaceFetcher {
  private storage: ImageStorage;
  private url: string;
  private maxAttempts: number;
  private headers: Record<string, string>;

  constructor(config: FaceConfig) {
    this.storage = new ImageStorage({ basePath: config.outputDir });
    this.url = config.url;
    this.maxAttempts = config.maxAttempts;
    this.headers = { 'User-Agent': config.userAgent };
  }

  /**
   * Download `count` colour/grayscale pairs
   */
  async fetchFaces(count: number): Promise<FaceFetchResult> {
    errorHandler.validate(Number.isInteger(count) && count >= 0, 'Face count must be a non-negative integer', { count });

    await this.storage.initialize(['color', 'grayscale']);
    logger.info('Fetching faces', { count, url: this.url, outputDir: this.storage.getBasePath() });

    const pairs: FacePair[] = [];
    for (let index = 1; index <= count; index++) {
      pairs.push(await this.fetchPair(index));
    }

    logger.info('Faces fetched', { count: pairs.length });
    return { pairs, outputDir: this.storage.getBasePath() };
  }

  private async fetchPair(index: number): Promise<FacePair> {
    const correlationId = logger.generateCorrelationId();
    const filename = imageFilename(index);

    try {
      const color = await this.storage.saveJpeg(await this.download(), `color/${filename}`, false);
      const grayscale = await this.storage.saveJpeg(await this.download(), `grayscale/${filename}`, true);

      logger.debug('Face pair saved', { index, correlationId });
      return { index, color, grayscale };
    } finally {
      logger.clearCorrelationId();
    }
  }

  private async download(): Promise<Buffer> {
    return errorHandler.retryWithBackoff(
      () => downloadBuffer(SERVICE_NAME, this.url, this.headers),
      this.maxAttempts
    );
  }
}

export default FaceFetcher;
