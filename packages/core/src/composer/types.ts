/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugLogger } from '../utils/debugLogger.js';
import type { KeyMatchers } from './keyMatchers.js';

export type ComposerMode = 'NORMAL' | 'INSERT' | 'VISUAL';

export type Operator = 'd' | 'y' | 'c';

export interface Position {
  row: number;
  col: number;
}

/** Anchor and moving end of a Visual selection, in either order. */
export interface Selection {
  start: Position;
  end: Position;
}

export interface CommandState {
  operator: Operator | null;
  /** Count typed before the operator, 0 when none was typed. */
  operatorCount: number;
  /** Count typed between the operator and its motion, 0 when none. */
  motionCount: number;
  awaitingMotion: boolean;
  /** A first `g` was typed and the next key completes `gg`. */
  pendingG: boolean;
}

export interface UndoSnapshot {
  readonly lines: readonly string[];
  readonly cursorRow: number;
  readonly cursorCol: number;
}

export interface UndoHistory {
  readonly states: readonly UndoSnapshot[];
  /** -1 only for a history with no checkpoint yet. */
  readonly index: number;
  readonly limit: number;
}

export interface Viewport {
  width: number;
  height: number;
  scrollOffset: number;
}

export interface ComposerState {
  mode: ComposerMode;
  lines: readonly string[];
  cursorRow: number;
  cursorCol: number;
  selection: Selection | null;
  clipboard: string;
  command: CommandState;
  /** Standalone count accumulator, 0 when none was typed. */
  count: number;
  /** Count to apply once `r` receives its character, or null. */
  pendingReplace: number | null;
  /** One of `f F t T` was typed and the next key is swallowed. */
  pendingFind: boolean;
  insertSession: boolean;
  history: UndoHistory;
  viewport: Viewport;
}

/** Collaborators every handler receives next to the state. */
export interface ComposerContext {
  keyMatchers: KeyMatchers;
  logger: DebugLogger;
}

export const initialCommandState: CommandState = {
  operator: null,
  operatorCount: 0,
  motionCount: 0,
  awaitingMotion: false,
  pendingG: false,
};
