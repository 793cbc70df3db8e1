/**
 * Pattern helpers
 *
 * A pattern that fails to compile or run is logged and treated as a miss,
 * so one bad expression never aborts a whole extraction.
 */

import { logger } from '../../logger';

/**
 * Compile a pattern built at run time. Returns null when the source is invalid.
 */
export function compilePattern(source: string, flags = 'i'): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    logger.error('Pattern compilation failed', error, { pattern: source });
    return null;
  }
}

/**
 * First match of a pattern, or null.
 */
export function firstMatch(pattern: RegExp | string, text: string): RegExpExecArray | null {
  const regex = typeof pattern === 'string' ? compilePattern(pattern) : pattern;
  if (!regex) return null;

  try {
    // Fresh copy without the global flag so lastIndex never leaks between calls
    return new RegExp(regex.source, regex.flags.replace('g', '')).exec(text);
  } catch (error) {
    logger.error('Pattern match failed', error, { pattern: regex.source });
    return null;
  }
}

/**
 * Capture group of the first match (numbered or named), or null.
 */
export function firstCapture(
  pattern: RegExp | string,
  text: string,
  group: number | string = 1
): string | null {
  const match = firstMatch(pattern, text);
  if (!match) return null;
  const value = typeof group === 'number' ? match[group] : match.groups?.[group];
  return value ?? null;
}

/**
 * Every non-overlapping match of a pattern, left to right.
 */
export function allMatches(pattern: RegExp | string, text: string): RegExpExecArray[] {
  const regex = typeof pattern === 'string' ? compilePattern(pattern) : pattern;
  if (!regex) return [];

  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  try {
    const global = new RegExp(regex.source, flags);
    const matches: RegExpExecArray[] = [];
    let match: RegExpExecArray | null;
    while ((match = global.exec(text)) !== null) {
      matches.push(match);
      if (match[0].length === 0) global.lastIndex++;
    }
    return matches;
  } catch (error) {
    logger.error('Pattern match failed', error, { pattern: regex.source });
    return [];
  }
}

/**
 * Escape a literal for use inside a pattern.
 */
export function escapePattern(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
