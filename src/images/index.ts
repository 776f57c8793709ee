/**
 * Image Module - Photo downloads for generated trees
 *
 * This module provides:
 * - FaceFetcher: colour/grayscale face pairs from the face service
 * - StockPhotoClient: family and wedding pictures from Pexels
 * - ImageStorage: JPEG re-encoding and file layout
 */

export {
  FaceFetcher,
  type FacePair,
  type FaceFetchResult
} from './FaceFetcher.js';

export {
  StockPhotoClient,
  parseSearchResponse,
  type StockPhoto,
  type PhotoFetchResult
} from './StockPhotoClient.js';

export {
  ImageStorage,
  imageFilename,
  type ImageStorageConfig,
  type SavedImage
} from './ImageStorage.js';
