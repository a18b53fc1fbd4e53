/**
 * DSV Utility Functions Module
 */

import { CompressionDetector } from "../../compression/detector";
import { DEFAULT_DELIMITERS } from "./constants";

const TAB_EXTENSIONS = [".tsv", ".tab"] as const;

/**
 * Pick a delimiter from a file name: tab for `.tsv`/`.tab`, comma otherwise
 *
 * A trailing `.gz` is ignored, so `reads.tsv.gz` is tab-delimited.
 */
export function delimiterForPath(filePath: string): string {
  const name = CompressionDetector.stripExtension(filePath).toLowerCase();
  return TAB_EXTENSIONS.some((ext) => name.endsWith(ext))
    ? DEFAULT_DELIMITERS.tsv
    : DEFAULT_DELIMITERS.csv;
}

/**
 * Remove Byte Order Mark (BOM) from text
 *
 * @param text - Text potentially containing BOM
 * @returns Text without BOM
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}
