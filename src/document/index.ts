/**
 * Hierarchical documents: the scalar/map tree and its file formats.
 *
 * @packageDocumentation
 */

export {
  DocumentFormatError,
  PATH_SEPARATOR,
  documentFromPlain,
  documentToPlain,
  flattenDocument,
  mapNode,
  scalarNode,
  unflattenEntries,
} from './tree.js';
export type { DocumentNode, MapNode, PlainDocument, ScalarNode } from './tree.js';
export {
  DocumentParseError,
  UnsupportedFormatError,
  formatForPath,
  parseDocument,
  parseFormatName,
  readDocumentFile,
  readFlatEntries,
  serializeValues,
  writeDocumentFile,
} from './formats.js';
export type { DocumentFormat, DocumentReader } from './formats.js';
