export type {
  Catalog,
  CatalogEntry,
  CatalogDocument,
  CatalogDocumentEntry,
  CatalogMetadataEntry,
  StreamSelection,
  SourcePage,
  RecordSource,
} from './types.js';
export { SchemaRegistry, validateStreamDefinition } from './registry.js';
export {
  discoverCatalog,
  renderCatalog,
  renderJsonSchema,
  parseCatalog,
  parseCatalogText,
  selectStreams,
  selectAll,
  selectByName,
  applyFieldSelections,
  automaticFields,
} from './catalog.js';
