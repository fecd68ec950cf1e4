/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import { cpLen, cpSlice, type VisibleRow } from '@modal-composer/core';

/**
 * Renders one composer row. The selected columns, or else the cursor cell,
 * are drawn inverted. A selection or cursor past the last character shows as
 * an inverted space.
 */
export function formatRow(row: VisibleRow): string {
  const { text, selection, cursorCol } = row;

  if (selection) {
    const [start, end] = selection;
    const len = cpLen(text);
    const selected = cpSlice(text, start, end) + (end > len ? ' ' : '');
    return (
      cpSlice(text, 0, start) + chalk.inverse(selected) + cpSlice(text, end)
    );
  }

  if (cursorCol === null) {
    return text;
  }
  return (
    cpSlice(text, 0, cursorCol) +
    chalk.inverse(cpSlice(text, cursorCol, cursorCol + 1) || ' ') +
    cpSlice(text, cursorCol + 1)
  );
}
