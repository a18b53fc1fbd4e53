/**
 * File reading utilities backed by Effect Platform
 *
 * Sources are read whole: the pipeline holds the table in memory anyway.
 * Gzip input is recognised by its magic bytes and decompressed on the way in.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, ValidationError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  autoDecompress: true,
  maxFileSize: 4_294_967_296, // 4GB
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails or the file cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * Read an entire file, decompressing gzip content when present
 *
 * @throws {FileError} If the file is missing, unreadable, not a regular file or too large
 * @throws {CompressionError} If the file looks like gzip but does not decompress
 */
export async function readToBytes(
  path: string,
  options: FileReaderOptions = {}
): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs.stat(validatedPath);
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(`read operation failed for ${validatedPath}: not a regular file`, validatedPath, "read")
      );
    }
    if (Number(info.size) > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${info.size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    const raw = yield* fs.readFile(validatedPath);
    if (!mergedOptions.autoDecompress) {
      return raw;
    }

    const detection = CompressionDetector.fromMagicBytes(raw.subarray(0, 4));
    const compression = yield* CompressionService;
    return yield* compression.decompress(raw, detection.format);
  }).pipe(
    Effect.mapError((error) =>
      error instanceof CompressionError ? error : FileError.fromSystemError("read", validatedPath, error)
    ),
    Effect.provide(CompressionService.Live)
  );

  return runWithPlatform(program);
}

/**
 * Read an entire file as UTF-8 text
 *
 * @throws {FileError} If the file cannot be read
 * @throws {CompressionError} If gzip content is corrupt
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readToBytes(path, options);
  return new TextDecoder("utf-8").decode(bytes);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid file reader options: ${validationResult.summary}`);
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
