/**
 * File writing operations using Effect Platform
 *
 * Output is staged in a temporary sibling file and renamed over the target
 * once fully written. A failed write leaves the target untouched and removes
 * the temporary file.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { FilePathSchema, WriteOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Compress data if options or the file extension ask for it
 */
function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError, CompressionService> {
  return Effect.gen(function* () {
    if (options.autoCompress === false) {
      return data;
    }

    let compressionFormat = options.compressionFormat ?? "none";
    if (compressionFormat === "none") {
      compressionFormat = CompressionDetector.fromExtension(filePath);
    }

    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(
      data,
      compressionFormat,
      options.compressionLevel ?? 6
    );
  });
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * Compresses automatically when the path ends in `.gz`.
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @param options - Compression settings
 * @throws {FileError} When the path is invalid or the file cannot be written
 * @throws {CompressionError} When compression fails
 *
 * @example
 * ```typescript
 * await writeString("fd_values.csv.gz", table); // gzip-compressed
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content), options);
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the path is invalid or the file cannot be written
 * @throws {CompressionError} When compression fails
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Promise<void> {
  const pathResult = FilePathSchema(path);
  if (pathResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${pathResult.summary}`, path, "write");
  }
  const optionsResult = WriteOptionsSchema(options);
  if (optionsResult instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${optionsResult.summary}`);
  }

  const tempPath = `${path}.${process.pid}-${Date.now()}.tmp`;

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(content, path, options);
    const fs = yield* FileSystem.FileSystem;

    const stage = fs.writeFile(tempPath, finalData).pipe(
      Effect.mapError((error) => FileError.fromSystemError("write", path, error)),
      Effect.zipRight(
        fs.rename(tempPath, path).pipe(
          Effect.mapError((error) => FileError.fromSystemError("rename", path, error))
        )
      )
    );

    // The write or rename failure is what gets reported, not the cleanup
    yield* stage.pipe(Effect.onError(() => Effect.ignore(fs.remove(tempPath))));
  }).pipe(Effect.provide(CompressionService.Live));

  await runWithPlatform(program);
}
