/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { lineLength, normalizeSelection } from './text-buffer.js';
import type { ComposerState } from './types.js';

/**
 * Scroll offset that keeps `cursorRow` inside a window of `height` rows,
 * moving as little as possible from `previousOffset`.
 */
export function computeScrollOffset(
  lineCount: number,
  cursorRow: number,
  height: number,
  previousOffset: number,
): number {
  if (lineCount <= height) {
    return 0;
  }
  let offset = previousOffset;
  if (cursorRow < offset) {
    offset = cursorRow;
  }
  if (cursorRow >= offset + height) {
    offset = cursorRow - height + 1;
  }
  const maxOffset = Math.max(0, lineCount - height);
  return Math.min(Math.max(offset, 0), maxOffset);
}

export function adjustScroll(state: ComposerState): ComposerState {
  const scrollOffset = computeScrollOffset(
    state.lines.length,
    state.cursorRow,
    state.viewport.height,
    state.viewport.scrollOffset,
  );
  if (scrollOffset === state.viewport.scrollOffset) {
    return state;
  }
  return { ...state, viewport: { ...state.viewport, scrollOffset } };
}

export function resizeViewport(
  state: ComposerState,
  width: number,
  height: number,
): ComposerState {
  return adjustScroll({
    ...state,
    viewport: { ...state.viewport, width, height },
  });
}

/** Render hints for one visible row. */
export interface VisibleRow {
  /** Index of the row in the buffer. */
  row: number;
  text: string;
  /** Cursor column when the cursor is on this row. */
  cursorCol: number | null;
  /**
   * Selected columns as `[start, end)` when a Visual selection covers this
   * row. `end` may exceed the line length by one on rows the selection
   * continues past.
   */
  selection: [number, number] | null;
}

export function getVisibleRows(state: ComposerState): VisibleRow[] {
  const { scrollOffset, height } = state.viewport;
  const range = state.selection ? normalizeSelection(state.selection) : null;
  const rows: VisibleRow[] = [];

  const last = Math.min(state.lines.length, scrollOffset + height);
  for (let row = scrollOffset; row < last; row++) {
    let selection: [number, number] | null = null;
    if (range && row >= range[0].row && row <= range[1].row) {
      const start = row === range[0].row ? range[0].col : 0;
      const end =
        row === range[1].row
          ? range[1].col + 1
          : lineLength(state.lines, row) + 1;
      selection = [start, end];
    }
    rows.push({
      row,
      text: state.lines[row],
      cursorCol: row === state.cursorRow ? state.cursorCol : null,
      selection,
    });
  }
  return rows;
}
