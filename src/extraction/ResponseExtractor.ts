/**
 * ResponseExtractor - Splits a generated response into markdown and a JSON payload.
 *
 * Strategies, first success wins:
 * 1. A ```json code fence
 * 2. A JSON object after a known marker ("## JSON Output", ...)
 * 3. A balanced object ending at the last '}' of the response
 *
 * Never throws. When nothing parses, the whole response is the markdown.
 */

import { STRUCTURED_DATA_MARKERS } from '../core/constants.js';
import { createLogger } from '../core/logging.js';
import type { ExtractionResult, JsonObject } from '../core/types.js';
import { isJsonObject } from '../utils/fs.js';

const log = createLogger('ResponseExtractor');

const FENCED_JSON = /```json\s*\n([\s\S]*?)\n```/;

/**
 * Parse a candidate payload. Only plain objects count.
 */
function parseObject(candidate: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Index of the '}' closing the '{' at `open`, counting depth forward.
 * Braces inside JSON strings are counted too. -1 when unbalanced.
 */
export function findClosingBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const char = text[i];
    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Index of the '{' opening the '}' at `close`, counting depth backward.
 */
export function findOpeningBrace(text: string, close: number): number {
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    const char = text[i];
    if (char === '}') {
      depth++;
    } else if (char === '{') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function fromCodeFence(text: string): ExtractionResult | null {
  const fence = FENCED_JSON.exec(text);
  if (!fence) {
    return null;
  }

  const structuredData = parseObject(fence[1]);
  if (!structuredData) {
    log.warn('Failed to parse JSON code fence, trying other strategies');
    return null;
  }

  log.debug('Parsed JSON from code fence');
  return { markdown: text.slice(0, fence.index).trim(), structuredData };
}

function fromMarkers(text: string): ExtractionResult | null {
  for (const marker of STRUCTURED_DATA_MARKERS) {
    const at = text.indexOf(marker);
    if (at === -1) {
      continue;
    }

    // A separator marker ending in '{' already holds the payload's opening brace
    const bodyStart = marker.endsWith('{') ? at + marker.length - 1 : at + marker.length;
    const body = text.slice(bodyStart);
    const open = body.indexOf('{');
    if (open === -1) {
      continue;
    }
    const close = findClosingBrace(body, open);
    if (close === -1) {
      continue;
    }

    const structuredData = parseObject(body.slice(open, close + 1));
    if (structuredData) {
      log.debug(`Parsed JSON after marker '${marker.replace(/\n/g, '\\n')}'`);
      return { markdown: text.slice(0, at).trim(), structuredData };
    }
  }
  return null;
}

function fromTrailingObject(text: string): ExtractionResult | null {
  const close = text.lastIndexOf('}');
  if (close <= 0) {
    return null;
  }
  const open = findOpeningBrace(text, close);
  if (open === -1) {
    return null;
  }

  const structuredData = parseObject(text.slice(open, close + 1));
  if (!structuredData) {
    return null;
  }

  log.debug('Parsed JSON from end of response');
  return { markdown: text.slice(0, open).trim(), structuredData };
}

export function extractStructuredResponse(text: string): ExtractionResult {
  const extracted = fromCodeFence(text) ?? fromMarkers(text) ?? fromTrailingObject(text);
  if (extracted) {
    return extracted;
  }

  log.debug('No structured JSON found in response');
  return { markdown: text, structuredData: null };
}
