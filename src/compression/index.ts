/**
 * Compression module
 *
 * Gzip support for p-value sources and result sinks.
 */

export { CompressionDetector } from './detector';
export { compress, decompress, type GzipOptions } from './gzip';
export { CompressionService, type CompressionServiceShape } from './service';

export type { CompressionDetection, CompressionFormat } from '../types';
