/**
 * ImageCatalog - Pool of local JPEG files to attach to generated people
 *
 * Files are found under the images directory and matched by their path:
 * `<imagesDir>/<folder>/<color|grayscale>/<name>.jpg`, where folder is
 * `people`, `family` or `wedding`. Each file is handed out once.
 */

import fs from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ImageCatalog');

export type ImageFolder = 'people' | 'family' | 'wedding';

export interface CatalogImage {
  /** Path relative to the catalog base path, with forward slashes */
  path: string;
  checksum: string;
}

export class ImageCatalog {
  private images: CatalogImage[];

  constructor(images: CatalogImage[] = []) {
    this.images = [...images].sort((a, b) => a.path.localeCompare(b.path));
  }

  /**
   * Scan a directory tree for *.jpg files.
   * A missing directory yields an empty catalog.
   *
   * @param imagesDir - Directory to scan
   * @param basePath - Directory the stored paths are made relative to
   */
  static async scan(imagesDir: string, basePath: string = process.cwd()): Promise<ImageCatalog> {
    const root = path.resolve(basePath, imagesDir);

    try {
      await fs.access(root);
    } catch {
      logger.debug('Images directory not found, no images will be attached', { root });
      return new ImageCatalog();
    }

    const files = await listJpegFiles(root);
    const images: CatalogImage[] = [];

    for (const file of files) {
      const contents = await fs.readFile(file);
      images.push({
        path: path.relative(basePath, file).split(path.sep).join('/'),
        checksum: createHash('md5').update(contents).digest('hex')
      });
    }

    logger.info('Image catalog loaded', { root, images: images.length });
    return new ImageCatalog(images);
  }

  /**
   * Remove and return the first image in the folder with the requested colour mode
   */
  take(folder: ImageFolder, color: boolean): CatalogImage | undefined {
    const mode = color ? 'color' : 'grayscale';
    const index = this.images.findIndex((image) => {
      const segments = image.path.split('/');
      return segments.includes(folder) && segments.includes(mode);
    });

    if (index === -1) {
      return undefined;
    }

    const [image] = this.images.splice(index, 1);
    return image;
  }

  get size(): number {
    return this.images.length;
  }
}

async function listJpegFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...await listJpegFiles(entryPath));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.jpg')) {
      files.push(entryPath);
    }
  }

  return files;
}
