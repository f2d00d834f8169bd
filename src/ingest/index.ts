/**
 * Ingestion Module
 *
 * @module ingest
 */

export { toRawRecords, composeAddress, DEFAULT_ADDRESS_FIELDS } from './rows.js';
export {
  readRowsFromFile,
  detectInputFormat,
  parseCsvRows,
  parseJsonRows,
  type InputFormat,
} from './files.js';
export {
  standardizePropertyClass,
  filterByPropertyClass,
  PROPERTY_CLASS_DESCRIPTIONS,
  DEFAULT_PROPERTY_CLASSES,
  DEFAULT_CLASS_COLUMN,
  type PropertyClassFilterOptions,
  type PropertyClassFilterResult,
  type PropertyClassStats,
  type PropertyClassCount,
} from './property-class.js';
