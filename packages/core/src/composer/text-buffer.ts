/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { cpAt, cpLen, cpSlice } from '../utils/textUtils.js';
import type { ComposerMode, Position, Selection } from './types.js';

// Helper functions for line-based word navigation
export const isWordCharStrict = (char: string): boolean =>
  /[\w\p{L}\p{N}]/u.test(char); // Matches a single character that is any Unicode letter, any Unicode number, or an underscore

export const isWhitespace = (char: string): boolean => /\s/.test(char);

export type CharClass = 'whitespace' | 'word' | 'punctuation';

/**
 * Classifies a character for word motions. Past the end of a line (`''`)
 * counts as whitespace. With `bigWord` set only whitespace separates words.
 */
export function charClass(char: string, bigWord = false): CharClass {
  if (char === '' || isWhitespace(char)) {
    return 'whitespace';
  }
  if (bigWord || isWordCharStrict(char)) {
    return 'word';
  }
  return 'punctuation';
}

export const lineAt = (lines: readonly string[], row: number): string =>
  lines[row] ?? '';

export const lineLength = (lines: readonly string[], row: number): number =>
  cpLen(lineAt(lines, row));

export const charAt = (
  lines: readonly string[],
  row: number,
  col: number,
): string => cpAt(lineAt(lines, row), col);

export function comparePositions(a: Position, b: Position): number {
  return a.row === b.row ? a.col - b.col : a.row - b.row;
}

/** Returns the two positions in textual order. */
export function orderPositions(a: Position, b: Position): [Position, Position] {
  return comparePositions(a, b) <= 0 ? [a, b] : [b, a];
}

export function normalizeSelection(selection: Selection): [Position, Position] {
  return orderPositions(selection.start, selection.end);
}

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/**
 * Clamps a position into the buffer. In Normal mode the cursor rests on a
 * character, so the last column is `length - 1`.
 */
export function clampPosition(
  lines: readonly string[],
  pos: Position,
  mode: ComposerMode,
): Position {
  const row = clamp(pos.row, 0, Math.max(0, lines.length - 1));
  const len = lineLength(lines, row);
  const maxCol = mode === 'NORMAL' && len > 0 ? len - 1 : len;
  return { row, col: clamp(pos.col, 0, maxCol) };
}

/** Normalises CR and CRLF line endings to '\n'. */
export const normalizeNewlines = (text: string): string =>
  text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

/**
 * Text between two ordered positions, end column exclusive. Rows are joined
 * with '\n'.
 */
export function getTextInRange(
  lines: readonly string[],
  start: Position,
  end: Position,
): string {
  if (start.row === end.row) {
    return cpSlice(lineAt(lines, start.row), start.col, end.col);
  }
  const parts = [cpSlice(lineAt(lines, start.row), start.col)];
  for (let row = start.row + 1; row < end.row; row++) {
    parts.push(lineAt(lines, row));
  }
  parts.push(cpSlice(lineAt(lines, end.row), 0, end.col));
  return parts.join('\n');
}

export interface EditResult {
  lines: string[];
  cursor: Position;
}

/**
 * Replaces the text between two ordered positions (end column exclusive)
 * with `text`, which may contain newlines. The returned cursor sits just
 * after the inserted text. An invalid range leaves the lines untouched.
 */
export function replaceRange(
  lines: readonly string[],
  start: Position,
  end: Position,
  text: string,
): EditResult {
  if (
    comparePositions(start, end) > 0 ||
    start.row < 0 ||
    start.col < 0 ||
    end.row >= lines.length
  ) {
    return { lines: [...lines], cursor: start };
  }

  const newLines = [...lines];
  const sCol = clamp(start.col, 0, lineLength(lines, start.row));
  const eCol = clamp(end.col, 0, lineLength(lines, end.row));

  const prefix = cpSlice(lineAt(lines, start.row), 0, sCol);
  const suffix = cpSlice(lineAt(lines, end.row), eCol);
  const parts = normalizeNewlines(text).split('\n');

  const firstLine = prefix + parts[0];
  if (parts.length === 1) {
    newLines.splice(start.row, end.row - start.row + 1, firstLine + suffix);
  } else {
    const lastLine = parts[parts.length - 1] + suffix;
    newLines.splice(
      start.row,
      end.row - start.row + 1,
      firstLine,
      ...parts.slice(1, -1),
      lastLine,
    );
  }

  const cursorRow = start.row + parts.length - 1;
  const cursorCol =
    (parts.length > 1 ? 0 : sCol) + cpLen(parts[parts.length - 1]);
  return { lines: newLines, cursor: { row: cursorRow, col: cursorCol } };
}

export const insertText = (
  lines: readonly string[],
  at: Position,
  text: string,
): EditResult => replaceRange(lines, at, at, text);

export const deleteRange = (
  lines: readonly string[],
  start: Position,
  end: Position,
): EditResult => replaceRange(lines, start, end, '');

/** The position one character before `pos`, stepping onto the previous line. */
export function positionBefore(
  lines: readonly string[],
  pos: Position,
): Position | null {
  if (pos.col > 0) {
    return { row: pos.row, col: pos.col - 1 };
  }
  if (pos.row > 0) {
    return { row: pos.row - 1, col: lineLength(lines, pos.row - 1) };
  }
  return null;
}

/** The position one character after `pos`, stepping onto the next line. */
export function positionAfter(
  lines: readonly string[],
  pos: Position,
): Position | null {
  if (pos.col < lineLength(lines, pos.row)) {
    return { row: pos.row, col: pos.col + 1 };
  }
  if (pos.row < lines.length - 1) {
    return { row: pos.row + 1, col: 0 };
  }
  return null;
}

/**
 * Removes `count` whole lines starting at `row`. Removing every line leaves
 * a single empty line.
 */
export function removeLines(
  lines: readonly string[],
  row: number,
  count: number,
): { lines: string[]; removed: string[] } {
  const removed = lines.slice(row, row + count);
  const remaining = [...lines.slice(0, row), ...lines.slice(row + count)];
  return { lines: remaining.length > 0 ? remaining : [''], removed };
}

/** Inserts whole lines so the first of them lands at index `row`. */
export function insertLines(
  lines: readonly string[],
  row: number,
  inserted: readonly string[],
): string[] {
  return [...lines.slice(0, row), ...inserted, ...lines.slice(row)];
}

/** Splits text into lines; an empty string yields one empty line. */
export const splitLines = (text: string): string[] =>
  normalizeNewlines(text).split('\n');

export function linesEqual(
  a: readonly string[],
  b: readonly string[],
): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}
