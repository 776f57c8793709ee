/**
 * Tree Module - Random family tree generation and Gramps XML export
 *
 * This module provides:
 * - TreeGenerator: builds a random tree
 * - ImageCatalog: local photos to attach to people and families
 * - GrampsXmlWriter: renders the tree as Gramps XML
 * - validateTree: structural checks before writing
 */

export {
  TreeGenerator,
  generateTree,
  type TreeGeneratorOptions
} from './TreeGenerator.js';

export {
  ImageCatalog,
  type CatalogImage,
  type ImageFolder
} from './ImageCatalog.js';

export {
  GrampsXmlWriter,
  type WriteOptions,
  type WriteResult
} from './GrampsXmlWriter.js';

export { validateTree, assertValidTree } from './validateTree.js';

export * from './types.js';
