/**
 * Gzip compression and decompression
 *
 * Whole-buffer only: tables are loaded and written in one piece, so there is
 * no streaming variant here.
 */

import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import { CompressionError } from '../errors';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

export interface GzipOptions {
  /** Compression level 1-9 (default: 6) */
  level?: number;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      'Invalid gzip magic bytes - file may not be gzip compressed',
      'gzip',
      'decompress',
      0
    );
  }
}

/**
 * Decompress an entire gzip buffer in memory
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  validateGzipFormat(compressed);

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'decompress', err, 0);
  }
}

/**
 * Compress an entire buffer with gzip
 *
 * @throws {CompressionError} If zlib rejects the input or level
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  try {
    const result = await gzipAsync(data, { level: options.level ?? 6 });
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'compress', err, data.length);
  }
}
