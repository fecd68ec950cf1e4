/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  clampPosition,
  comparePositions,
  deleteRange,
  getTextInRange,
  insertLines,
  insertText,
  lineLength,
  normalizeSelection,
  orderPositions,
  removeLines,
  replaceRange,
} from './text-buffer.js';
import { checkpoint } from './undo-history.js';
import { cpLen } from '../utils/textUtils.js';
import type {
  ComposerContext,
  ComposerState,
  Operator,
  Position,
} from './types.js';

/** Upper bound on the characters one counted paste inserts. */
export const MAX_PASTE_LENGTH = 100_000;

const cursorOf = (state: ComposerState): Position => ({
  row: state.cursorRow,
  col: state.cursorCol,
});

function withCursor(state: ComposerState, pos: Position): ComposerState {
  return { ...state, cursorRow: pos.row, cursorCol: pos.col };
}

function enterInsert(state: ComposerState, pos: Position): ComposerState {
  const cursor = clampPosition(state.lines, pos, 'INSERT');
  return {
    ...withCursor(state, cursor),
    mode: 'INSERT',
    insertSession: true,
    selection: null,
  };
}

/** Removes `[start, end)` into the register without saving a checkpoint. */
function cutSpan(
  state: ComposerState,
  start: Position,
  end: Position,
): ComposerState {
  if (comparePositions(start, end) >= 0) {
    return withCursor(state, start);
  }
  const clipboard = getTextInRange(state.lines, start, end);
  const { lines } = deleteRange(state.lines, start, end);
  return { ...withCursor(state, start), lines, clipboard };
}

export function deleteSpan(
  state: ComposerState,
  ctx: ComposerContext,
  start: Position,
  end: Position,
): ComposerState {
  return checkpoint(cutSpan(state, start, end), ctx);
}

export function yankSpan(
  state: ComposerState,
  start: Position,
  end: Position,
): ComposerState {
  if (comparePositions(start, end) >= 0) {
    return state;
  }
  return { ...state, clipboard: getTextInRange(state.lines, start, end) };
}

/** Deletes the span and opens an insert session; the checkpoint waits for Esc. */
export function changeSpan(
  state: ComposerState,
  start: Position,
  end: Position,
): ComposerState {
  return enterInsert(cutSpan(state, start, end), start);
}

/**
 * Applies an operator from the cursor to a motion target. Inclusive targets
 * take their own column into the span.
 */
export function applyOperator(
  state: ComposerState,
  ctx: ComposerContext,
  operator: Operator,
  target: Position,
  inclusive: boolean,
): ComposerState {
  const [start, rawEnd] = orderPositions(cursorOf(state), {
    row: target.row,
    col: target.col,
  });
  const end = inclusive
    ? {
        row: rawEnd.row,
        col: Math.min(rawEnd.col + 1, lineLength(state.lines, rawEnd.row)),
      }
    : rawEnd;

  switch (operator) {
    case 'd':
      return deleteSpan(state, ctx, start, end);
    case 'y':
      return yankSpan(state, start, end);
    case 'c':
      return changeSpan(state, start, end);
    default: {
      const exhaustiveCheck: never = operator;
      return exhaustiveCheck;
    }
  }
}

/** `dd`, `yy` and `cc` over `count` lines from the cursor row. */
export function applyLineOperator(
  state: ComposerState,
  ctx: ComposerContext,
  operator: Operator,
  count: number,
): ComposerState {
  const row = state.cursorRow;
  const n = Math.min(Math.max(1, count), state.lines.length - row);
  const text = state.lines.slice(row, row + n).join('\n');

  switch (operator) {
    case 'y':
      return { ...state, clipboard: text };
    case 'd': {
      const { lines } = removeLines(state.lines, row, n);
      const next = {
        ...state,
        lines,
        clipboard: text,
        cursorRow: Math.min(row, lines.length - 1),
        cursorCol: 0,
      };
      return checkpoint(next, ctx);
    }
    case 'c': {
      const { lines: remaining } = removeLines(state.lines, row, n);
      const lines =
        remaining.length === 1 && n === state.lines.length
          ? remaining
          : insertLines(remaining, row, ['']);
      return enterInsert({ ...state, lines, clipboard: text }, { row, col: 0 });
    }
    default: {
      const exhaustiveCheck: never = operator;
      return exhaustiveCheck;
    }
  }
}

function lineEndSpan(state: ComposerState): [Position, Position] {
  const cursor = cursorOf(state);
  return [cursor, { row: cursor.row, col: lineLength(state.lines, cursor.row) }];
}

/** `D` */
export function deleteToLineEnd(
  state: ComposerState,
  ctx: ComposerContext,
): ComposerState {
  const [start, end] = lineEndSpan(state);
  return deleteSpan(state, ctx, start, end);
}

/** `C` */
export function changeToLineEnd(state: ComposerState): ComposerState {
  const [start, end] = lineEndSpan(state);
  return changeSpan(state, start, end);
}

/** `Y` */
export function yankToLineEnd(state: ComposerState): ComposerState {
  const [start, end] = lineEndSpan(state);
  return yankSpan(state, start, end);
}

/** `x`: deletes up to `count` characters under and after the cursor. */
export function deleteChars(
  state: ComposerState,
  ctx: ComposerContext,
  count: number,
): ComposerState {
  const start = cursorOf(state);
  const end = {
    row: start.row,
    col: Math.min(start.col + count, lineLength(state.lines, start.row)),
  };
  return deleteSpan(state, ctx, start, end);
}

/** `r`: overwrites up to `count` characters starting at the cursor. */
export function replaceChars(
  state: ComposerState,
  ctx: ComposerContext,
  replacement: string,
  count: number,
): ComposerState {
  const start = cursorOf(state);
  const len = lineLength(state.lines, start.row);
  const n = Math.min(count, len - start.col);
  if (n <= 0) {
    return state;
  }
  const { lines } = replaceRange(
    state.lines,
    start,
    { row: start.row, col: start.col + n },
    replacement.repeat(n),
  );
  return checkpoint({ ...state, lines }, ctx);
}

/**
 * `p` and `P`. Register text containing '\n' goes in as whole lines below
 * (`after`) or above the cursor line; anything else goes in after or at the
 * cursor column with the cursor left on the last pasted character.
 */
export function paste(
  state: ComposerState,
  ctx: ComposerContext,
  after: boolean,
  count: number,
): ComposerState {
  const register = state.clipboard;
  if (register === '') {
    return state;
  }
  const times = Math.max(
    1,
    Math.min(count, Math.floor(MAX_PASTE_LENGTH / register.length)),
  );

  if (register.includes('\n')) {
    const pasted = Array.from({ length: times }, () =>
      register.split('\n'),
    ).flat();
    const row = after ? state.cursorRow + 1 : state.cursorRow;
    const lines = insertLines(state.lines, row, pasted);
    return checkpoint({ ...state, lines, cursorRow: row, cursorCol: 0 }, ctx);
  }

  const len = lineLength(state.lines, state.cursorRow);
  const col = after ? Math.min(state.cursorCol + 1, len) : state.cursorCol;
  const text = register.repeat(times);
  const { lines } = insertText(
    state.lines,
    { row: state.cursorRow, col },
    text,
  );
  return checkpoint(
    { ...state, lines, cursorCol: col + cpLen(text) - 1 },
    ctx,
  );
}

/** The normalized Visual selection as an end-exclusive span. */
function selectionSpan(state: ComposerState): [Position, Position] | null {
  if (!state.selection) {
    return null;
  }
  const [start, last] = normalizeSelection(state.selection);
  const end = {
    row: last.row,
    col: Math.min(last.col + 1, lineLength(state.lines, last.row)),
  };
  return [start, end];
}

function leaveVisual(state: ComposerState): ComposerState {
  return { ...state, mode: 'NORMAL', selection: null };
}

export function deleteSelection(
  state: ComposerState,
  ctx: ComposerContext,
): ComposerState {
  const span = selectionSpan(state);
  if (!span) {
    return leaveVisual(state);
  }
  return deleteSpan(leaveVisual(state), ctx, span[0], span[1]);
}

export function yankSelection(state: ComposerState): ComposerState {
  const span = selectionSpan(state);
  if (!span) {
    return leaveVisual(state);
  }
  return withCursor(yankSpan(leaveVisual(state), span[0], span[1]), span[0]);
}

export function changeSelection(state: ComposerState): ComposerState {
  const span = selectionSpan(state);
  if (!span) {
    return leaveVisual(state);
  }
  return changeSpan(leaveVisual(state), span[0], span[1]);
}

