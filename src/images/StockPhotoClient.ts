/**
 * StockPhotoClient - Downloads stock photos from the Pexels search API
 *
 * Used to fill the `family` and `wedding` folders the tree generator draws
 * pictures from. Results alternate between colour (even positions) and
 * grayscale (odd positions); file numbers follow the result position, so
 * `color/` holds 00001, 00003, ... and `grayscale/` holds 00002, 00004, ...
 */

import type { PhotoConfig } from '../utils/config.js';
import errorHandler, { ExternalServiceError } from '../utils/ErrorHandler.js';
import { createLogger } from '../utils/logger.js';
import { downloadBuffer, fetchUrl, validateHttpResponse } from './download.js';
import { ImageStorage, imageFilename, type SavedImage } from './ImageStorage.js';

const logger = createLogger('StockPhotoClient');

const SERVICE_NAME = 'Pexels';

/** Largest page the search API returns */
export const MAX_PER_PAGE = 80;

export interface StockPhoto {
  id: number;
  largeUrl: string;
}

export interface PhotoFetchResult {
  query: string;
  saved: SavedImage[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the photo list out of a search response
 */
export function parseSearchResponse(body: unknown): StockPhoto[] {
  if (!isRecord(body) || !Array.isArray(body.photos)) {
    throw new ExternalServiceError(SERVICE_NAME, 'search response has no photos array');
  }

  const photos: StockPhoto[] = [];
  for (const photo of body.photos) {
    if (isRecord(photo) && typeof photo.id === 'number' && isRecord(photo.src) && typeof photo.src.large === 'string') {
      photos.push({ id: photo.id, largeUrl: photo.src.large });
    }
  }
  return photos;
}

export class StockPhotoClient {
  private storage: ImageStorage;
  private apiUrl: string;
  private apiKey: string;
  private userAgent: string;

  constructor(config: PhotoConfig) {
    this.storage = new ImageStorage({ basePath: config.imagesDir });
    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.userAgent = config.userAgent;
  }

  /**
   * Search for photos matching a one-word query
   */
  async search(query: string, perPage: number): Promise<StockPhoto[]> {
    const url = new URL(this.apiUrl);
    url.searchParams.set('query', query);
    url.searchParams.set('per_page', String(perPage));

    const response = await fetchUrl(url.toString(), {
      'Authorization': this.apiKey,
      'User-Agent': this.userAgent
    });
    validateHttpResponse(SERVICE_NAME, response);

    const photos = parseSearchResponse(await response.json());
    logger.info('Photo search completed', { query, results: photos.length });
    return photos;
  }

  /**
   * Download `count` colour and `count` grayscale photos into `<imagesDir>/<query>/`
   */
  async fetchPhotos(query: string, count: number): Promise<PhotoFetchResult> {
    errorHandler.validate(
      query.length > 0 && !/\s/.test(query),
      'Please provide a query and don\'t use spaces.',
      { query }
    );
    errorHandler.validate(Number.isInteger(count) && count >= 0, 'Photo count must be a non-negative integer', { count });

    const saved: SavedImage[] = [];
    if (count === 0) {
      return { query, saved };
    }

    await this.storage.initialize([`${query}/color`, `${query}/grayscale`]);

    const wanted = count * 2;
    const photos = await this.search(query, Math.min(MAX_PER_PAGE, wanted));

    for (const [i, photo] of photos.entries()) {
      if (i === wanted) break;

      const useColor = i % 2 === 0;
      const folder = useColor ? 'color' : 'grayscale';
      const buffer = await downloadBuffer(SERVICE_NAME, photo.largeUrl, { 'User-Agent': this.userAgent });
      saved.push(await this.storage.saveJpeg(buffer, `${query}/${folder}/${imageFilename(i + 1)}`, !useColor));
    }

    if (saved.length < wanted) {
      logger.warn('Fewer photos available than requested', { query, requested: wanted, saved: saved.length });
    }
    logger.info('Stock photos fetched', { query, saved: saved.length });
    return { query, saved };
  }
}

export default StockPhotoClient;
