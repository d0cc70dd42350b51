/**
 * Recording loaders
 * @module signal/loader
 */

export { parseEcgCsv, loadEcgCsvFile, parseCell } from './csv-reader';
