/**
 * Input normalization and format detection.
 *
 * Anything that opens like a JSON object is routed to the schema codec, even
 * when it is malformed, so the decode error reports the offending field
 * instead of the payload being read as a list of text lines.
 */

import { ImportError } from './import-error';
import type { FormatDetection } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Turn the caller's bytes or string into text, rejecting empty, oversized
 * and non-UTF-8 payloads.
 */
export function readRawInput(raw: string | Uint8Array, maxBytes: number): string {
  const size = typeof raw === 'string' ? Buffer.byteLength(raw, 'utf8') : raw.byteLength;
  if (size > maxBytes) {
    throw ImportError.invalidData(`input is ${size} bytes, the limit is ${maxBytes}`);
  }

  let text: string;
  if (typeof raw === 'string') {
    text = raw;
  } else {
    try {
      text = utf8.decode(raw);
    } catch {
      throw ImportError.invalidData('input is not valid UTF-8 text');
    }
  }

  text = stripBom(text);
  if (!text.trim()) {
    throw ImportError.invalidData('input is empty');
  }
  return text;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * `structured` for anything that opens like a JSON object; everything else,
 * JSON arrays and checkbox lines (`[x] Milk`) included, is `freeText`.
 */
export function detectInputFormat(text: string): FormatDetection {
  const hints: string[] = [];
  const trimmed = text.trim();
  const first = trimmed.charAt(0);

  if (first === '{') {
    hints.push('json-object');
    const parsed = tryParseJson(trimmed);
    if (!parsed.ok) {
      hints.push('malformed-json');
    } else if (parsed.value !== null && typeof parsed.value === 'object' && 'version' in parsed.value) {
      hints.push('version-key');
    }
    return { format: 'structured', hints };
  }

  const lineCount = trimmed.split(/\r\n|\r|\n/).filter((l) => l.trim()).length;
  hints.push(`lines=${lineCount}`);
  return { format: 'freeText', hints };
}
