/**
 * Filesystem probes that treat unreadable paths as absent.
 */

import { readFileSync, statSync } from 'fs';
import type { JsonObject } from '../core/types.js';

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON file. Returns undefined when the file is missing,
 * unreadable or not valid JSON.
 */
export function readJsonFile(path: string): unknown {
  if (!isFile(path)) {
    return undefined;
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return undefined;
  }
}

/**
 * Read a JSON file whose top level must be an object.
 */
export function readJsonObject(path: string): JsonObject | null {
  const data = readJsonFile(path);
  return isJsonObject(data) ? data : null;
}
