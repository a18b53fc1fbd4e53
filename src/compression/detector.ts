/**
 * Compression format detection for p-value tables
 *
 * Sources are recognised by their gzip magic bytes; sinks by their file
 * extension, since there is nothing to sniff before they are written.
 */

import type { CompressionDetection, CompressionFormat } from '../types';
import { CompressionError } from '../errors';

// Magic number constants for gzip
const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('per_read_pvals.csv.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * detection.format; // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');

    for (const ext of GZIP_EXTENSIONS) {
      if (normalizedPath.endsWith(ext)) {
        return 'gzip';
      }
    }

    return 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * An empty buffer is reported as uncompressed.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte)
    ) {
      return {
        format: 'gzip',
        confidence: 1.0, // Perfect magic byte match
        detectionMethod: 'magic-bytes',
      };
    }

    return {
      format: 'none',
      confidence: bytes.length === 0 ? 0.5 : 0.9,
      detectionMethod: 'magic-bytes',
    };
  }

  /**
   * Strip a trailing compression extension, e.g. `reads.tsv.gz` -> `reads.tsv`
   */
  static stripExtension(filePath: string): string {
    const lower = filePath.toLowerCase();
    for (const ext of GZIP_EXTENSIONS) {
      if (lower.endsWith(ext)) {
        return filePath.slice(0, filePath.length - ext.length);
      }
    }
    return filePath;
  }
}
