/**
 * Stock Photo Entry Point
 *
 * Fills images/<query>/ with pictures the tree generator uses for families
 * and weddings. Requires PEXELS_API_KEY.
 *
 * Usage:
 *   npm run photos -- 10 --query=wedding
 *   npm run photos -- 10 --query=family
 */

import 'dotenv/config';
import logger from './utils/logger.js';
import errorHandler from './utils/ErrorHandler.js';
import { getOption, parseCount } from './utils/args.js';
import { loadPhotoConfig } from './utils/config.js';
import { StockPhotoClient } from './images/index.js';

const USAGE = 'npm run photos -- <count> --query=<word>';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const count = parseCount(args, USAGE);
  const query = getOption(args, 'query') ?? '';
  const config = loadPhotoConfig();

  const result = await logger.measureAsync(
    () => new StockPhotoClient(config).fetchPhotos(query, count),
    `fetch ${count} photo pairs for "${query}"`
  );

  logger.info('Stock photos stored', { query: result.query, files: result.saved.length });
}

main().catch(error => {
  errorHandler.exitWithError(error);
});
