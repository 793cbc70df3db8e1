/**
 * Text Normalization
 *
 * Turns per-page raw text into the flat line sequence every extractor scans.
 */

import type { NormalizedDocument, RawPage } from '../../types';
import { ParsingError } from '../../errors';
import { config } from '../../config';

export interface NormalizeOptions {
  /** Lines shorter than this (after trimming) are dropped */
  minLineLength?: number;
}

const LINE_BREAK = /\r\n|[\n\r\u0085\u2028\u2029]/;

/**
 * Split pages into trimmed lines, dropping short lines and absent pages.
 *
 * @throws ParsingError DOCUMENT_EMPTY when there are no pages at all
 * @throws ParsingError UNREADABLE_DOCUMENT when no line survives filtering
 */
export function normalizeDocument(
  pages: readonly RawPage[],
  options: NormalizeOptions = {}
): NormalizedDocument {
  if (pages.length === 0) {
    throw ParsingError.documentEmpty();
  }

  const minLineLength = options.minLineLength ?? config.minLineLength;
  const lines: string[] = [];

  for (const page of pages) {
    if (!page) continue;

    for (const rawLine of page.split(LINE_BREAK)) {
      const line = rawLine.trim();
      if (Array.from(line).length >= minLineLength) {
        lines.push(line);
      }
    }
  }

  if (lines.length === 0) {
    throw ParsingError.unreadableDocument();
  }

  return Object.freeze(lines);
}

/**
 * Join lines into one searchable string for multi-line patterns.
 */
export function joinLines(lines: readonly string[]): string {
  return lines.join(' ');
}
