/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { interpretKey } from './command-interpreter.js';
import type { Key } from './key.js';
import { createKeyMatchers } from './keyMatchers.js';
import type { KeyMatchers } from './keyMatchers.js';
import { normalizeSelection, splitLines } from './text-buffer.js';
import {
  canRedo,
  canUndo,
  checkpoint,
  createUndoHistory,
  saveSnapshot,
  snapshotOf,
} from './undo-history.js';
import { adjustScroll, getVisibleRows, resizeViewport } from './viewport.js';
import type { VisibleRow } from './viewport.js';
import { initialCommandState } from './types.js';
import type {
  ComposerContext,
  ComposerMode,
  ComposerState,
  Position,
  Viewport,
} from './types.js';
import {
  resolveComposerOptions,
  type ComposerOptions,
  type ResolvedComposerOptions,
} from '../config/composerConfig.js';
import { FatalConfigError } from '../utils/errors.js';

/**
 * Builds the state a composer starts from: Insert mode with an open insert
 * session and one checkpoint of the initial text.
 */
export function createComposerState(
  options: Pick<
    ResolvedComposerOptions,
    'initialText' | 'width' | 'height' | 'undoLimit'
  >,
): ComposerState {
  const state: ComposerState = {
    mode: 'INSERT',
    lines: splitLines(options.initialText),
    cursorRow: 0,
    cursorCol: 0,
    selection: null,
    clipboard: '',
    command: initialCommandState,
    count: 0,
    pendingReplace: null,
    pendingFind: false,
    insertSession: true,
    history: createUndoHistory(options.undoLimit),
    viewport: {
      width: options.width,
      height: options.height,
      scrollOffset: 0,
    },
  };
  return adjustScroll({
    ...state,
    history: saveSnapshot(state.history, snapshotOf(state)),
  });
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new FatalConfigError(
      `Invalid composer options:\n  ${name}: expected a positive integer, got ${value}`,
    );
  }
}

/**
 * A modal (Normal / Insert / Visual) multi-line text composer. Hosts feed
 * it one key event at a time and read back text, cursor and render hints;
 * it does no rendering of its own.
 */
export class ModalComposer {
  private state: ComposerState;
  private readonly ctx: ComposerContext;
  private readonly placeholder: string;

  /** @throws {FatalConfigError} when an option is invalid. */
  constructor(options: ComposerOptions = {}) {
    const resolved = resolveComposerOptions(options);
    this.ctx = {
      keyMatchers: createKeyMatchers(resolved.keyBindings),
      logger: resolved.logger,
    };
    this.placeholder = resolved.placeholder;
    this.state = createComposerState(resolved);
  }

  /** Consumes exactly one key event. Never throws. */
  handleKey(key: Key): ComposerState {
    this.state = interpretKey(this.state, key, this.ctx);
    return this.state;
  }

  getState(): ComposerState {
    return this.state;
  }

  getText(): string {
    return this.state.lines.join('\n');
  }

  getLines(): readonly string[] {
    return this.state.lines;
  }

  getMode(): ComposerMode {
    return this.state.mode;
  }

  getCursor(): Position {
    return { row: this.state.cursorRow, col: this.state.cursorCol };
  }

  /** The Visual selection in textual order, or null outside Visual mode. */
  getSelection(): [Position, Position] | null {
    return this.state.selection
      ? normalizeSelection(this.state.selection)
      : null;
  }

  getClipboard(): string {
    return this.state.clipboard;
  }

  getScrollOffset(): number {
    return this.state.viewport.scrollOffset;
  }

  getViewport(): Readonly<Viewport> {
    return this.state.viewport;
  }

  getVisibleRows(): VisibleRow[] {
    return getVisibleRows(this.state);
  }

  getPlaceholder(): string {
    return this.placeholder;
  }

  /** The matchers built from this composer's key bindings. */
  getKeyMatchers(): KeyMatchers {
    return this.ctx.keyMatchers;
  }

  isEmpty(): boolean {
    return this.state.lines.length === 1 && this.state.lines[0] === '';
  }

  canUndo(): boolean {
    return canUndo(this.state.history);
  }

  canRedo(): boolean {
    return canRedo(this.state.history);
  }

  /**
   * Replaces the whole buffer and puts the cursor at the origin. Outside an
   * insert session the new text becomes a checkpoint.
   */
  setText(text: string): void {
    const mode = this.state.mode === 'VISUAL' ? 'NORMAL' : this.state.mode;
    let next: ComposerState = {
      ...this.state,
      mode,
      lines: splitLines(text),
      selection: null,
      command: initialCommandState,
      count: 0,
      pendingReplace: null,
      pendingFind: false,
      cursorRow: 0,
      cursorCol: 0,
    };
    if (!next.insertSession) {
      next = checkpoint(next, this.ctx);
    }
    this.state = adjustScroll(next);
  }

  /** @throws {FatalConfigError} unless both sizes are positive integers. */
  setViewport(width: number, height: number): void {
    assertDimension('width', width);
    assertDimension('height', height);
    this.state = resizeViewport(this.state, width, height);
  }
}
