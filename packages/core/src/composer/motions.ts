/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  charAt,
  charClass,
  clampPosition,
  isWhitespace,
  lineAt,
  lineLength,
} from './text-buffer.js';
import { toCodePoints } from '../utils/textUtils.js';
import type { ComposerMode, Position } from './types.js';

export type Motion =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'wordForward'
  | 'bigWordForward'
  | 'wordBackward'
  | 'bigWordBackward'
  | 'wordEnd'
  | 'bigWordEnd'
  | 'lineStart'
  | 'firstNonBlank'
  | 'lineEnd'
  | 'documentLine'
  | 'documentStart';

/** Where a motion lands and whether an operator should include that column. */
export interface MotionTarget extends Position {
  inclusive: boolean;
}

const MOTION_KEYS: Readonly<Record<string, Motion>> = {
  h: 'left',
  l: 'right',
  k: 'up',
  j: 'down',
  w: 'wordForward',
  W: 'bigWordForward',
  b: 'wordBackward',
  B: 'bigWordBackward',
  e: 'wordEnd',
  E: 'bigWordEnd',
  '0': 'lineStart',
  '^': 'firstNonBlank',
  _: 'firstNonBlank',
  $: 'lineEnd',
  G: 'documentLine',
};

/** Looks up the single-character motion for a typed key. `gg` is not here. */
export function motionForChar(char: string): Motion | undefined {
  return Object.prototype.hasOwnProperty.call(MOTION_KEYS, char)
    ? MOTION_KEYS[char]
    : undefined;
}

// The cursor mode used when revalidating a column after a vertical move.
// Operators and Visual mode may address the column past the last character.
const columnMode = (mode: ComposerMode): ComposerMode =>
  mode === 'NORMAL' ? 'NORMAL' : 'INSERT';

export function nextWordStart(
  lines: readonly string[],
  pos: Position,
  bigWord: boolean,
): Position {
  const chars = toCodePoints(lineAt(lines, pos.row));
  let col = pos.col;

  if (col < chars.length) {
    const cls = charClass(chars[col], bigWord);
    if (cls !== 'whitespace') {
      while (col < chars.length && charClass(chars[col], bigWord) === cls) {
        col++;
      }
    }
    while (col < chars.length && isWhitespace(chars[col])) {
      col++;
    }
  }

  if (col >= chars.length) {
    if (pos.row < lines.length - 1) {
      return { row: pos.row + 1, col: 0 };
    }
    return { row: pos.row, col: chars.length };
  }
  return { row: pos.row, col };
}

export function prevWordStart(
  lines: readonly string[],
  pos: Position,
  bigWord: boolean,
): Position {
  let row = pos.row;
  let col = Math.min(pos.col, lineLength(lines, row));

  const stepBack = (): boolean => {
    if (col > 0) {
      col--;
      return true;
    }
    if (row > 0) {
      row--;
      col = Math.max(0, lineLength(lines, row) - 1);
      return true;
    }
    return false;
  };

  if (!stepBack()) {
    return { row, col };
  }
  while (charClass(charAt(lines, row, col), bigWord) === 'whitespace') {
    if (!stepBack()) {
      return { row, col };
    }
  }

  const chars = toCodePoints(lineAt(lines, row));
  const cls = charClass(chars[col], bigWord);
  while (col > 0 && charClass(chars[col - 1], bigWord) === cls) {
    col--;
  }
  return { row, col };
}

/** Returns `null` when no word follows `pos`. */
export function nextWordEnd(
  lines: readonly string[],
  pos: Position,
  bigWord: boolean,
): Position | null {
  let row = pos.row;
  let col = pos.col;

  const stepForward = (): boolean => {
    if (col + 1 < lineLength(lines, row)) {
      col++;
      return true;
    }
    if (row < lines.length - 1) {
      row++;
      col = 0;
      return true;
    }
    return false;
  };

  if (!stepForward()) {
    return null;
  }
  while (charClass(charAt(lines, row, col), bigWord) === 'whitespace') {
    if (!stepForward()) {
      return null;
    }
  }

  const chars = toCodePoints(lineAt(lines, row));
  const cls = charClass(chars[col], bigWord);
  while (col + 1 < chars.length && charClass(chars[col + 1], bigWord) === cls) {
    col++;
  }
  return { row, col };
}

export function firstNonBlankColumn(line: string): number {
  const index = toCodePoints(line).findIndex((ch) => !isWhitespace(ch));
  return index === -1 ? 0 : index;
}

function repeat(
  start: Position,
  count: number,
  step: (pos: Position) => Position,
): Position {
  let pos = start;
  for (let i = 0; i < count; i++) {
    const next = step(pos);
    if (next.row === pos.row && next.col === pos.col) {
      break;
    }
    pos = next;
  }
  return pos;
}

/**
 * Resolves a motion from `cursor`. `count` is the typed repeat count, or
 * `undefined` when none was typed; document motions use it as a 1-based line
 * number and every other motion repeats `count ?? 1` times.
 */
export function resolveMotion(
  lines: readonly string[],
  cursor: Position,
  motion: Motion,
  count: number | undefined,
  mode: ComposerMode,
): MotionTarget {
  const n = Math.max(1, count ?? 1);
  const exclusive = (pos: Position): MotionTarget => ({
    ...pos,
    inclusive: false,
  });

  switch (motion) {
    case 'left':
      return exclusive({ row: cursor.row, col: Math.max(0, cursor.col - n) });
    case 'right':
      return exclusive({
        row: cursor.row,
        col: Math.min(lineLength(lines, cursor.row), cursor.col + n),
      });
    case 'up':
    case 'down': {
      const row = motion === 'up' ? cursor.row - n : cursor.row + n;
      return exclusive(
        clampPosition(lines, { row, col: cursor.col }, columnMode(mode)),
      );
    }
    case 'wordForward':
    case 'bigWordForward': {
      const big = motion === 'bigWordForward';
      return exclusive(
        repeat(cursor, n, (pos) => nextWordStart(lines, pos, big)),
      );
    }
    case 'wordBackward':
    case 'bigWordBackward': {
      const big = motion === 'bigWordBackward';
      return exclusive(
        repeat(cursor, n, (pos) => prevWordStart(lines, pos, big)),
      );
    }
    case 'wordEnd':
    case 'bigWordEnd': {
      const big = motion === 'bigWordEnd';
      let pos = cursor;
      for (let i = 0; i < n; i++) {
        const next = nextWordEnd(lines, pos, big);
        if (!next) {
          break;
        }
        pos = next;
      }
      return { ...pos, inclusive: pos !== cursor };
    }
    case 'lineStart':
      return exclusive({ row: cursor.row, col: 0 });
    case 'firstNonBlank':
      return exclusive({
        row: cursor.row,
        col: firstNonBlankColumn(lineAt(lines, cursor.row)),
      });
    case 'lineEnd':
      return exclusive({ row: cursor.row, col: lineLength(lines, cursor.row) });
    case 'documentLine': {
      const row = count === undefined ? lines.length - 1 : count - 1;
      return exclusive(clampPosition(lines, { row, col: 0 }, mode));
    }
    case 'documentStart': {
      const row = count === undefined ? 0 : count - 1;
      return exclusive(clampPosition(lines, { row, col: 0 }, mode));
    }
    default: {
      const exhaustiveCheck: never = motion;
      return exhaustiveCheck;
    }
  }
}
