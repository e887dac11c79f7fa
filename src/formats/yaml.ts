/**
 * YAML Document Parser
 */

import { isScalar, parseDocument, YAMLParseError } from 'yaml';
import { ParseError } from '../core/errors';

const VERSION_PATH = ['info', 'version'];

/**
 * Parse a YAML string into a JavaScript value. Anchors and aliases are
 * expanded; merge keys (`<<`) are honoured. A numeric `info.version` keeps
 * its source text, so `1.10` stays "1.10".
 */
export function parseYaml(input: string, source = '(input)'): unknown {
  try {
    const doc = parseDocument(input, { merge: true });
    if (doc.errors.length > 0) throw doc.errors[0];

    const version = doc.getIn(VERSION_PATH, true);
    if (isScalar(version) && typeof version.value === 'number' && version.source !== undefined) {
      version.value = version.source;
    }
    return doc.toJS();
  } catch (error) {
    const line = error instanceof YAMLParseError && error.linePos ? `:${error.linePos[0].line}` : '';
    throw new ParseError(
      `${source}${line}`,
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Check if a file name has a YAML extension.
 */
export function isYamlFile(fileName: string): boolean {
  return /\.ya?ml$/i.test(fileName);
}
