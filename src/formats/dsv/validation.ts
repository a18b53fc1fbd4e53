/**
 * @module formats/dsv/validation
 * @description ArkType schemas for DSV parser and writer options, plus field size checks
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { DEFAULT_QUOTE, MAX_FIELD_SIZE } from "./constants";

/**
 * Validate that a field doesn't exceed the maximum allowed size
 *
 * @throws {DSVParseError} if field exceeds size limit
 */
export function validateFieldSize(field: string, maxSize: number = MAX_FIELD_SIZE): void {
  // UTF-8 needs at most three bytes per UTF-16 unit
  if (field.length * 3 <= maxSize) return;

  const sizeInBytes = new TextEncoder().encode(field).length;
  if (sizeInBytes > maxSize) {
    throw new DSVParseError(
      `Field size (${sizeInBytes} bytes) exceeds maximum allowed (${maxSize} bytes)`
    );
  }
}

/**
 * ArkType validation schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "delimiter?": "string",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.delimiter === DEFAULT_QUOTE) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "a delimiter other than the quote character",
      actual: JSON.stringify(options.delimiter),
    });
  }

  return true;
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "delimiter?": "string",
  "missingValue?": "string",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (
    options.missingValue !== undefined &&
    options.delimiter !== undefined &&
    options.missingValue.includes(options.delimiter)
  ) {
    return ctx.reject({
      path: ["missingValue"],
      expected: "a missing-value marker without the delimiter",
      actual: JSON.stringify(options.missingValue),
    });
  }

  return true;
});
