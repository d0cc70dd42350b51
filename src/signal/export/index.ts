/**
 * Metrics export
 * @module signal/export
 */

export {
  MetricsWriter,
  jsonPathFor,
  toPersistable,
  type MetricsWriterOptions,
  type MetricsDocument,
  type WriteResult,
} from './json-writer';
