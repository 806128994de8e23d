/**
 * Source file readers keyed by lower-case extension.
 *
 * The composing application builds the table and hands it to
 * PromptBuilder; readers for binary formats (.docx, .pdf) are added there.
 */

import { readFileSync } from 'fs';
import type { SourceReader } from '../core/types.js';

export function readTextFile(path: string): string {
  return readFileSync(path, 'utf-8');
}

export const TEXT_EXTENSIONS = ['.txt', '.md', '.text', '.markdown'] as const;

export function createDefaultSourceReaders(): Map<string, SourceReader> {
  return new Map(TEXT_EXTENSIONS.map((extension): [string, SourceReader] => [extension, readTextFile]));
}
