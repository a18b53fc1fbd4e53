/**
 * Tests for error classes and CLI suggestions
 */

import { describe, expect, test } from "vitest";
import {
  CompressionError,
  DSVParseError,
  DuplicateKeyError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  MalformedInputError,
  ValidationError,
} from "../src/errors";

describe("error classes", () => {
  test("DSVParseError appends its location to the message", () => {
    const error = new DSVParseError("Unclosed quote in field", 4, 2);

    expect(error.message).toBe("Unclosed quote in field (line 4, column 2)");
    expect(error.reason).toBe("Unclosed quote in field");
    expect(error.code).toBe("PARSE_ERROR");
  });

  test("MalformedInputError.fromParseError keeps the location without repeating it", () => {
    const error = MalformedInputError.fromParseError(
      new DSVParseError("Row has 2 columns, expected 3", 5),
      "pvals.csv"
    );

    expect(error.message).toBe("Row has 2 columns, expected 3");
    expect(error.lineNumber).toBe(5);
    expect(error.filePath).toBe("pvals.csv");
    expect(error.code).toBe("MALFORMED_INPUT");
  });

  test("MalformedInputError.toString includes file and column", () => {
    const error = new MalformedInputError("Cell \"x\" is not a p-value in [0, 1]", "in.csv", 3, 2);

    expect(error.toString()).toBe(
      'MalformedInputError: Cell "x" is not a p-value in [0, 1] (line 3)\nFile: in.csv\nColumn: 2'
    );
  });

  test("DuplicateKeyError carries the key", () => {
    const error = DuplicateKeyError.forObservation("r1", 7);

    expect(error.key).toBe("r1@7");
    expect(error.toString()).toBe(
      'DuplicateKeyError: Read "r1" has more than one p-value at position 7\nKey: r1@7'
    );
  });

  test("FileError.fromSystemError adds a suggestion for missing files", () => {
    const error = FileError.fromSystemError("read", "in.csv", new Error("ENOENT: no such file"));

    expect(error.message).toBe(
      "read operation failed for in.csv: ENOENT: no such file. " +
        "Check that the file path is correct and the parent directory exists"
    );
    expect(error.filePath).toBe("in.csv");
    expect(error.operation).toBe("read");
  });

  test("FileError.fromSystemError passes a FileError through", () => {
    const original = new FileError("boom", "out.csv", "write");

    expect(FileError.fromSystemError("rename", "out.csv", original)).toBe(original);
  });
});

describe("getErrorSuggestion", () => {
  test("maps each failure to its hint", () => {
    expect(getErrorSuggestion(DuplicateKeyError.forReadId("r1"))).toBe(
      ERROR_SUGGESTIONS.DUPLICATE_READ_ID
    );
    expect(
      getErrorSuggestion(new MalformedInputError('Position label "x" is not a non-negative integer'))
    ).toBe(ERROR_SUGGESTIONS.NON_INTEGER_POSITION);
    expect(getErrorSuggestion(new MalformedInputError("Row has 2 columns, expected 3"))).toBe(
      ERROR_SUGGESTIONS.RAGGED_ROW
    );
    expect(getErrorSuggestion(new MalformedInputError('Cell "2" is not a p-value in [0, 1]'))).toBe(
      ERROR_SUGGESTIONS.BAD_PVALUE
    );
    expect(getErrorSuggestion(new ValidationError("Invalid thresholds: lower must be..."))).toBe(
      ERROR_SUGGESTIONS.BAD_THRESHOLDS
    );
    expect(getErrorSuggestion(new CompressionError("bad", "gzip", "decompress"))).toBe(
      ERROR_SUGGESTIONS.COMPRESSED_FILE_ERROR
    );
  });

  test("has no hint for other errors", () => {
    expect(getErrorSuggestion(new FileError("gone", "in.csv", "read"))).toBeUndefined();
  });
});
