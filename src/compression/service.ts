/**
 * Effect-based compression service for symmetric I/O
 *
 * The file reader and writer resolve compression through this service rather
 * than calling gzip directly, so tests can swap in a passthrough layer.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, 'gzip', 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from 'effect';
import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';
import { compress as compressGzip, decompress as decompressGzip } from './gzip';

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   *
   * @param level - Compression level, 1-9
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Decompress data previously compressed with the specified format
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

/**
 * Compression service tag for Effect dependency injection
 */
export class CompressionService extends Context.Tag('@fdvalues/CompressionService')<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function toCompressionError(
  error: unknown,
  operation: 'compress' | 'decompress'
): CompressionError {
  return error instanceof CompressionError
    ? error
    : CompressionError.fromSystemError('gzip', operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === 'none'
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) => toCompressionError(error, 'compress'),
          }),

    decompress: (data, format) =>
      format === 'none'
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => decompressGzip(data),
            catch: (error) => toCompressionError(error, 'decompress'),
          }),
  };
}
