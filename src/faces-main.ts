/**
 * Face Fetcher Entry Point
 *
 * Usage:
 *   npm run faces -- 3   - fetch 3 colour and 3 grayscale faces into images/people
 */

import 'dotenv/config';
import logger from './utils/logger.js';
import errorHandler from './utils/ErrorHandler.js';
import { parseCount } from './utils/args.js';
import { loadFaceConfig } from './utils/config.js';
import { FaceFetcher } from './images/index.js';

async function main(): Promise<void> {
  const count = parseCount(process.argv.slice(2), 'npm run faces -- <count>');
  const config = loadFaceConfig();

  const result = await logger.measureAsync(
    () => new FaceFetcher(config).fetchFaces(count),
    `fetch ${count} faces`
  );

  logger.info('Faces stored', { outputDir: result.outputDir, pairs: result.pairs.length });
}

main().catch(error => {
  errorHandler.exitWithError(error);
});
