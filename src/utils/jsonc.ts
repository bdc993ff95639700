/**
 * JSONC (JSON with Comments) file utilities
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import jsonc, { type ParseError } from 'jsonc-parser';
import { FILE_PATTERNS } from '../constants/index.js';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSONC text into a plain object.
 * @throws Error listing the parse errors, or when the top level is not an object
 */
export function parseJsoncObject(content: string, source: string): JsonObject {
  const errors: ParseError[] = [];
  const parsed: unknown = jsonc.parse(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const details = errors
      .map(error => `${jsonc.printParseErrorCode(error.error)} at offset ${error.offset}`)
      .join(', ');
    throw new Error(`Failed to parse ${source}: ${details}`);
  }
  if (!isJsonObject(parsed)) {
    throw new Error(`${source} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Walk up from this file until the directory holding the bundled templates
 * is found. Works from both src/ and dist/.
 */
export function getProjectRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let i = 0; i < 10; i++) {
    if (existsSync(join(dir, FILE_PATTERNS.TEMPLATE_DIR))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return join(dirname(fileURLToPath(import.meta.url)), '..', '..');
}

/**
 * Read a JSON file relative to the project root (e.g. package.json)
 */
export function readProjectJsonSync(relativePath: string): JsonObject {
  const fullPath = join(getProjectRoot(), relativePath);
  return parseJsoncObject(readFileSync(fullPath, 'utf-8'), relativePath);
}
