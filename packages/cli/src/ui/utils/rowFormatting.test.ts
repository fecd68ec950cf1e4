/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatRow } from './rowFormatting.js';

describe('formatRow', () => {
  it('should return plain text without cursor or selection', () => {
    expect(
      formatRow({ row: 0, text: 'abc', cursorCol: null, selection: null }),
    ).toBe('abc');
  });

  it('should invert the cursor cell', () => {
    expect(
      formatRow({ row: 0, text: 'abcd', cursorCol: 2, selection: null }),
    ).toBe('ab' + chalk.inverse('c') + 'd');
    expect(
      formatRow({ row: 0, text: 'ab', cursorCol: 2, selection: null }),
    ).toBe('ab' + chalk.inverse(' '));
  });

  it('should invert the selected columns', () => {
    expect(
      formatRow({ row: 0, text: 'abcdef', cursorCol: 3, selection: [1, 4] }),
    ).toBe('a' + chalk.inverse('bcd') + 'ef');
  });

  it('should show a selection running past the line end', () => {
    expect(
      formatRow({ row: 1, text: 'ab', cursorCol: null, selection: [0, 3] }),
    ).toBe(chalk.inverse('ab '));
  });

  it('should count columns in code points', () => {
    expect(
      formatRow({ row: 0, text: 'a😀b', cursorCol: 1, selection: null }),
    ).toBe('a' + chalk.inverse('😀') + 'b');
  });
});
