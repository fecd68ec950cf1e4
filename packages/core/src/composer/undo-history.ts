/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { linesEqual } from './text-buffer.js';
import { DEFAULT_UNDO_LIMIT } from '../config/composerConfig.js';
import type {
  ComposerContext,
  ComposerState,
  UndoHistory,
  UndoSnapshot,
} from './types.js';

export function createUndoHistory(
  limit: number = DEFAULT_UNDO_LIMIT,
): UndoHistory {
  return { states: [], index: -1, limit };
}

export function snapshotOf(state: ComposerState): UndoSnapshot {
  return {
    lines: [...state.lines],
    cursorRow: state.cursorRow,
    cursorCol: state.cursorCol,
  };
}

/**
 * Records `snapshot` after the current index. Returns the same history when
 * the snapshot's lines equal the current entry. Saving drops any redo
 * entries and evicts the oldest entry once `limit` is exceeded.
 */
export function saveSnapshot(
  history: UndoHistory,
  snapshot: UndoSnapshot,
): UndoHistory {
  const current = history.states[history.index];
  if (current && linesEqual(current.lines, snapshot.lines)) {
    return history;
  }

  const states = [...history.states.slice(0, history.index + 1), snapshot];
  let index = history.index + 1;
  if (states.length > history.limit) {
    states.shift();
    index--;
  }
  return { ...history, states, index };
}

export const canUndo = (history: UndoHistory): boolean => history.index > 0;

export const canRedo = (history: UndoHistory): boolean =>
  history.index < history.states.length - 1;

/** Steps back one entry, or returns `null` at the oldest checkpoint. */
export function stepBack(
  history: UndoHistory,
): { history: UndoHistory; snapshot: UndoSnapshot } | null {
  if (!canUndo(history)) {
    return null;
  }
  const index = history.index - 1;
  return { history: { ...history, index }, snapshot: history.states[index] };
}

/** Steps forward one entry, or returns `null` at the newest checkpoint. */
export function stepForward(
  history: UndoHistory,
): { history: UndoHistory; snapshot: UndoSnapshot } | null {
  if (!canRedo(history)) {
    return null;
  }
  const index = history.index + 1;
  return { history: { ...history, index }, snapshot: history.states[index] };
}

/** Saves a checkpoint of the live buffer into the state's history. */
export function checkpoint(
  state: ComposerState,
  ctx: ComposerContext,
): ComposerState {
  const history = saveSnapshot(state.history, snapshotOf(state));
  if (history === state.history) {
    ctx.logger.debug('undo: unchanged buffer, checkpoint skipped');
    return state;
  }
  ctx.logger.debug(
    `undo: saved checkpoint ${history.index + 1}/${history.states.length}`,
  );
  return { ...state, history };
}

function restore(
  state: ComposerState,
  step: { history: UndoHistory; snapshot: UndoSnapshot },
): ComposerState {
  return {
    ...state,
    history: step.history,
    lines: [...step.snapshot.lines],
    cursorRow: step.snapshot.cursorRow,
    cursorCol: step.snapshot.cursorCol,
  };
}

export function undo(state: ComposerState, ctx: ComposerContext): ComposerState {
  const step = stepBack(state.history);
  if (!step) {
    ctx.logger.debug('undo: nothing to undo');
    return state;
  }
  ctx.logger.debug(`undo: restored checkpoint ${step.history.index + 1}`);
  return restore(state, step);
}

export function redo(state: ComposerState, ctx: ComposerContext): ComposerState {
  const step = stepForward(state.history);
  if (!step) {
    ctx.logger.debug('redo: nothing to redo');
    return state;
  }
  ctx.logger.debug(`redo: restored checkpoint ${step.history.index + 1}`);
  return restore(state, step);
}
