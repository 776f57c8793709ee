/**
 * Random Tree Entry Point
 *
 * Generates a random family tree and writes it as Gramps XML.
 *
 * Usage:
 *   npm run tree                         - write random_tree.gramps
 *   npm run tree -- --seed=42            - reproducible tree
 *   npm run tree -- --output=my.gramps   - other output file
 */

import 'dotenv/config';
import logger from './utils/logger.js';
import errorHandler from './utils/ErrorHandler.js';
import { getOption } from './utils/args.js';
import { loadCountryBounds, loadTreeConfig, type TreeConfig } from './utils/config.js';
import {
  GrampsXmlWriter,
  ImageCatalog,
  TreeGenerator,
  assertValidTree,
  getTreeStats
} from './tree/index.js';

function loadConfig(): TreeConfig {
  const args = process.argv.slice(2);
  const seed = getOption(args, 'seed');
  const output = getOption(args, 'output');

  // command line flags win over the environment
  return loadTreeConfig({
    ...process.env,
    ...(seed !== undefined ? { TREE_SEED: seed } : {}),
    ...(output !== undefined ? { TREE_OUTPUT: output } : {})
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Configuration', {
    outputPath: config.outputPath,
    locale: config.locale,
    country: config.countryCode,
    generations: config.generations,
    seed: config.seed ?? 'random',
    compress: config.compress,
    imagesDir: config.imagesDir
  });

  const bounds = await loadCountryBounds(config.countryCode);
  const catalog = await ImageCatalog.scan(config.imagesDir);

  const generator = new TreeGenerator({
    locale: config.locale,
    bounds,
    generations: config.generations,
    seed: config.seed,
    catalog
  });
  const tree = generator.build();
  assertValidTree(tree);

  const result = await logger.measureAsync(
    () => new GrampsXmlWriter().write(tree, config.outputPath, { compress: config.compress }),
    'write Gramps XML'
  );

  logger.info('Random tree written', {
    path: result.path,
    seed: generator.seed,
    ...getTreeStats(tree)
  });
}

main().catch(error => {
  errorHandler.exitWithError(error);
});
