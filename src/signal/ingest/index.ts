/**
 * Signal ingestion exports
 * @module signal/ingest
 */

export {
  SignalIngestor,
  canInterpolate,
  interpolateMissing,
  type SignalIngestorOptions,
} from './signal-ingestor';
