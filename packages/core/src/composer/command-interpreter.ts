/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Command } from './keyMatchers.js';
import { printableText } from './key.js';
import type { Key } from './key.js';
import {
  firstNonBlankColumn,
  motionForChar,
  resolveMotion,
} from './motions.js';
import type { Motion } from './motions.js';
import {
  applyLineOperator,
  applyOperator,
  changeSelection,
  changeToLineEnd,
  deleteChars,
  deleteSelection,
  deleteToLineEnd,
  paste,
  replaceChars,
  yankSelection,
  yankToLineEnd,
} from './operators.js';
import {
  clampPosition,
  deleteRange,
  insertLines,
  insertText,
  lineAt,
  positionAfter,
  positionBefore,
} from './text-buffer.js';
import { checkpoint, redo, undo } from './undo-history.js';
import { adjustScroll } from './viewport.js';
import { initialCommandState } from './types.js';
import type {
  ComposerContext,
  ComposerMode,
  ComposerState,
  Operator,
  Position,
} from './types.js';
import { cpLen } from '../utils/textUtils.js';

// Constants
const DIGIT_MULTIPLIER = 10;
const DEFAULT_COUNT = 1;
/** Counts stop growing at this value. */
export const MAX_COUNT = 99_999;

const appendDigit = (count: number, digit: number): number =>
  Math.min(count * DIGIT_MULTIPLIER + digit, MAX_COUNT);

export type ModeHandler = (
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
) => ComposerState;

const isOperator = (char: string): char is Operator =>
  char === 'd' || char === 'y' || char === 'c';

const cursorOf = (state: ComposerState): Position => ({
  row: state.cursorRow,
  col: state.cursorCol,
});

/** The key's text when it is exactly one printable character, else ''. */
function singleChar(key: Key): string {
  const text = printableText(key);
  return cpLen(text) === 1 ? text : '';
}

function describeKey(key: Key): string {
  if (key.insertable) {
    return JSON.stringify(key.sequence);
  }
  const mods = [key.ctrl && 'ctrl', key.alt && 'alt', key.shift && 'shift']
    .filter(Boolean)
    .join('+');
  return mods ? `${mods}+${key.name}` : key.name;
}

function arrowMotion(key: Key, ctx: ComposerContext): Motion | undefined {
  if (ctx.keyMatchers[Command.MOVE_LEFT](key)) return 'left';
  if (ctx.keyMatchers[Command.MOVE_RIGHT](key)) return 'right';
  if (ctx.keyMatchers[Command.MOVE_UP](key)) return 'up';
  if (ctx.keyMatchers[Command.MOVE_DOWN](key)) return 'down';
  return undefined;
}

/** Clamps the cursor to what the state's current mode allows. */
function revalidateCursor(state: ComposerState): ComposerState {
  const pos = clampPosition(state.lines, cursorOf(state), state.mode);
  if (pos.row === state.cursorRow && pos.col === state.cursorCol) {
    return state;
  }
  return { ...state, cursorRow: pos.row, cursorCol: pos.col };
}

/** Ends a Normal or Visual command: clears counts and pending keys. */
function finishCommand(state: ComposerState): ComposerState {
  return revalidateCursor({
    ...state,
    count: 0,
    command: initialCommandState,
    pendingFind: false,
    pendingReplace: null,
  });
}

/** Appends a digit to the active counter, or returns null if it is no count. */
function accumulateCount(
  state: ComposerState,
  char: string,
): ComposerState | null {
  if (!/^[0-9]$/.test(char)) {
    return null;
  }
  const digit = Number(char);
  const { command } = state;
  if (command.awaitingMotion) {
    if (digit === 0 && command.motionCount === 0) {
      return null;
    }
    return {
      ...state,
      command: {
        ...command,
        motionCount: appendDigit(command.motionCount, digit),
      },
    };
  }
  if (digit === 0 && state.count === 0) {
    return null;
  }
  return { ...state, count: appendDigit(state.count, digit) };
}

function moveCursor(
  state: ComposerState,
  motion: Motion,
  count: number | undefined,
): ComposerState {
  const target = resolveMotion(
    state.lines,
    cursorOf(state),
    motion,
    count,
    state.mode,
  );
  const moved = { ...state, cursorRow: target.row, cursorCol: target.col };
  if (moved.mode === 'VISUAL' && moved.selection) {
    return {
      ...moved,
      selection: {
        ...moved.selection,
        end: { row: target.row, col: target.col },
      },
    };
  }
  return moved;
}

const typedCount = (count: number): number | undefined =>
  count > 0 ? count : undefined;

function beginInsert(state: ComposerState, pos: Position): ComposerState {
  return {
    ...state,
    mode: 'INSERT',
    insertSession: true,
    cursorRow: pos.row,
    cursorCol: pos.col,
  };
}

/** Opens a new empty line below (`o`) or above (`O`) and starts inserting. */
function openLine(state: ComposerState, below: boolean): ComposerState {
  const row = below ? state.cursorRow + 1 : state.cursorRow;
  const lines = insertLines(state.lines, row, ['']);
  return beginInsert({ ...state, lines }, { row, col: 0 });
}

/* ───────────────────────────── Normal mode ───────────────────────────── */

/** Second key after `d`, `y` or `c`. */
function handleOperatorMotion(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  const { operator, operatorCount, motionCount, pendingG } = state.command;
  const char = singleChar(key);
  const cleared = { ...state, command: initialCommandState, count: 0 };
  if (!operator) {
    return finishCommand(cleared);
  }

  const explicit = operatorCount > 0 || motionCount > 0;
  const effectiveCount =
    Math.max(DEFAULT_COUNT, operatorCount) *
    Math.max(DEFAULT_COUNT, motionCount);
  const count = explicit ? effectiveCount : undefined;

  let motion: Motion | undefined;
  if (pendingG) {
    motion = char === 'g' ? 'documentStart' : undefined;
  } else if (char === operator) {
    return finishCommand(
      applyLineOperator(cleared, ctx, operator, effectiveCount),
    );
  } else if (char === 'g') {
    return { ...state, command: { ...state.command, pendingG: true } };
  } else {
    motion = motionForChar(char) ?? arrowMotion(key, ctx);
  }

  if (!motion) {
    ctx.logger.debug(`normal: ${operator} aborted by ${describeKey(key)}`);
    return finishCommand(cleared);
  }

  const target = resolveMotion(
    state.lines,
    cursorOf(state),
    motion,
    count,
    'NORMAL',
  );
  return finishCommand(
    applyOperator(cleared, ctx, operator, target, target.inclusive),
  );
}

function handleNormalCommand(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  const char = singleChar(key);
  const count = typedCount(state.count);
  const n = count ?? DEFAULT_COUNT;

  if (state.command.pendingG) {
    if (char === 'g') {
      return finishCommand(moveCursor(state, 'documentStart', count));
    }
    ctx.logger.debug(`normal: g${describeKey(key)} is not a command`);
    return finishCommand(state);
  }

  if (ctx.keyMatchers[Command.ESCAPE](key)) {
    return finishCommand(state);
  }
  if (ctx.keyMatchers[Command.REDO](key)) {
    return finishCommand(redo(state, ctx));
  }

  const motion = motionForChar(char) ?? arrowMotion(key, ctx);
  if (motion) {
    return finishCommand(moveCursor(state, motion, count));
  }

  if (isOperator(char)) {
    return {
      ...state,
      count: 0,
      command: {
        ...initialCommandState,
        operator: char,
        operatorCount: state.count,
        awaitingMotion: true,
      },
    };
  }

  const line = lineAt(state.lines, state.cursorRow);
  switch (char) {
    case 'g':
      return { ...state, command: { ...state.command, pendingG: true } };
    case 'f':
    case 'F':
    case 't':
    case 'T':
      return { ...finishCommand(state), pendingFind: true };
    case ';':
    case ',':
      return finishCommand(state);
    case 'i':
      return finishCommand(beginInsert(state, cursorOf(state)));
    case 'I':
      return finishCommand(
        beginInsert(state, {
          row: state.cursorRow,
          col: firstNonBlankColumn(line),
        }),
      );
    case 'a':
      return finishCommand(
        beginInsert(state, {
          row: state.cursorRow,
          col: Math.min(state.cursorCol + 1, cpLen(line)),
        }),
      );
    case 'A':
      return finishCommand(
        beginInsert(state, { row: state.cursorRow, col: cpLen(line) }),
      );
    case 'o':
      return finishCommand(openLine(state, true));
    case 'O':
      return finishCommand(openLine(state, false));
    case 'v':
      return finishCommand({
        ...state,
        mode: 'VISUAL',
        selection: { start: cursorOf(state), end: cursorOf(state) },
      });
    case 'x':
      return finishCommand(deleteChars(state, ctx, n));
    case 'r':
      return { ...finishCommand(state), pendingReplace: n };
    case 'D':
      return finishCommand(deleteToLineEnd(state, ctx));
    case 'C':
      return finishCommand(changeToLineEnd(state));
    case 'Y':
      return finishCommand(yankToLineEnd(state));
    case 'p':
      return finishCommand(paste(state, ctx, true, n));
    case 'P':
      return finishCommand(paste(state, ctx, false, n));
    case 'u':
      return finishCommand(undo(state, ctx));
    default:
      ctx.logger.debug(`normal: ignored key ${describeKey(key)}`);
      return finishCommand(state);
  }
}

export function handleNormalKey(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  const char = singleChar(key);

  if (state.pendingReplace !== null) {
    const cleared = { ...state, pendingReplace: null };
    if (char === '') {
      ctx.logger.debug(
        `normal: r expects a character, got ${describeKey(key)}`,
      );
      return finishCommand(cleared);
    }
    return finishCommand(
      replaceChars(cleared, ctx, char, state.pendingReplace),
    );
  }

  if (state.pendingFind) {
    return finishCommand(state);
  }

  if (!state.command.pendingG) {
    const counted = accumulateCount(state, char);
    if (counted) {
      return counted;
    }
  }

  if (state.command.awaitingMotion) {
    return handleOperatorMotion(state, key, ctx);
  }
  return handleNormalCommand(state, key, ctx);
}

/* ───────────────────────────── Insert mode ───────────────────────────── */

function applyEdit(
  state: ComposerState,
  edit: { lines: string[]; cursor: Position },
): ComposerState {
  return {
    ...state,
    lines: edit.lines,
    cursorRow: edit.cursor.row,
    cursorCol: edit.cursor.col,
  };
}

/** Esc: closes the insert session with one checkpoint and steps left. */
function leaveInsert(state: ComposerState, ctx: ComposerContext): ComposerState {
  const saved = state.insertSession ? checkpoint(state, ctx) : state;
  return finishCommand({
    ...saved,
    mode: 'NORMAL',
    insertSession: false,
    cursorCol: Math.max(0, saved.cursorCol - 1),
  });
}

export function handleInsertKey(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  const { keyMatchers } = ctx;
  const cursor = cursorOf(state);

  if (keyMatchers[Command.ESCAPE](key)) {
    return leaveInsert(state, ctx);
  }
  if (keyMatchers[Command.NEWLINE](key)) {
    return applyEdit(state, insertText(state.lines, cursor, '\n'));
  }
  if (keyMatchers[Command.INSERT_TAB](key)) {
    return applyEdit(state, insertText(state.lines, cursor, '\t'));
  }
  if (keyMatchers[Command.DELETE_CHAR_LEFT](key)) {
    const before = positionBefore(state.lines, cursor);
    return before
      ? applyEdit(state, deleteRange(state.lines, before, cursor))
      : state;
  }
  if (keyMatchers[Command.DELETE_CHAR_RIGHT](key)) {
    const after = positionAfter(state.lines, cursor);
    return after
      ? applyEdit(state, {
          ...deleteRange(state.lines, cursor, after),
          cursor,
        })
      : state;
  }
  const motion = arrowMotion(key, ctx);
  if (motion) {
    return revalidateCursor(moveCursor(state, motion, DEFAULT_COUNT));
  }

  const text = printableText(key);
  if (text !== '') {
    return applyEdit(state, insertText(state.lines, cursor, text));
  }
  ctx.logger.debug(`insert: ignored key ${describeKey(key)}`);
  return state;
}

/* ───────────────────────────── Visual mode ───────────────────────────── */

export function handleVisualKey(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  const char = singleChar(key);
  const count = typedCount(state.count);

  if (ctx.keyMatchers[Command.ESCAPE](key)) {
    return finishCommand({ ...state, mode: 'NORMAL', selection: null });
  }

  if (state.command.pendingG) {
    if (char === 'g') {
      return finishCommand(moveCursor(state, 'documentStart', count));
    }
    return finishCommand(state);
  }

  const counted = accumulateCount(state, char);
  if (counted) {
    return counted;
  }

  const motion = motionForChar(char) ?? arrowMotion(key, ctx);
  if (motion) {
    return finishCommand(moveCursor(state, motion, count));
  }

  switch (char) {
    case 'g':
      return { ...state, command: { ...state.command, pendingG: true } };
    case 'd':
    case 'x':
      return finishCommand(deleteSelection(state, ctx));
    case 'y':
      return finishCommand(yankSelection(state));
    case 'c':
      return finishCommand(changeSelection(state));
    default:
      ctx.logger.debug(`visual: ignored key ${describeKey(key)}`);
      return finishCommand(state);
  }
}

/* ───────────────────────────── Dispatch ───────────────────────────── */

export const modeHandlers: { readonly [M in ComposerMode]: ModeHandler } = {
  NORMAL: handleNormalKey,
  INSERT: handleInsertKey,
  VISUAL: handleVisualKey,
};

/**
 * Feeds one key event through the handler for the current mode, then
 * brings the scroll offset back around the cursor.
 */
export function interpretKey(
  state: ComposerState,
  key: Key,
  ctx: ComposerContext,
): ComposerState {
  return adjustScroll(modeHandlers[state.mode](state, key, ctx));
}

