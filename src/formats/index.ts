/**
 * Document Formats — Barrel export
 */

import * as fs from 'fs';
import { ParseError } from '../core/errors';
import { isJson, parseJson } from './json';
import { isYamlFile, parseYaml } from './yaml';

export { parseJson, isJson } from './json';
export { parseYaml, isYamlFile } from './yaml';

/**
 * Parse document text, choosing the parser from the file name when there is
 * one and sniffing the content otherwise. JSON is a subset of YAML, so YAML
 * is the fallback.
 */
export function parseDocument(text: string, fileName?: string): unknown {
  const source = fileName ?? '(input)';

  if (fileName && /\.json$/i.test(fileName)) {
    return parseJson(text, source);
  }
  if (fileName && isYamlFile(fileName)) {
    return parseYaml(text, source);
  }

  return isJson(text) ? parseJson(text, source) : parseYaml(text, source);
}

/**
 * Read and parse a document from disk.
 */
export function loadDocument(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ParseError(
      filePath,
      `Unable to read file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return parseDocument(text, filePath);
}
