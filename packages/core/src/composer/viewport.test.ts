/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { computeScrollOffset, getVisibleRows } from './viewport.js';
import { ModalComposer } from './composer.js';
import { FatalConfigError } from '../utils/errors.js';
import { DOWN, ESC, normalComposer, press } from '../test-utils/composer.js';

describe('viewport', () => {
  describe('computeScrollOffset', () => {
    it.each([
      { lineCount: 5, cursorRow: 0, height: 10, previous: 3, expected: 0 },
      { lineCount: 20, cursorRow: 15, height: 5, previous: 0, expected: 11 },
      { lineCount: 20, cursorRow: 2, height: 5, previous: 10, expected: 2 },
      { lineCount: 20, cursorRow: 12, height: 5, previous: 10, expected: 10 },
      { lineCount: 20, cursorRow: 19, height: 5, previous: 30, expected: 15 },
    ])(
      'should scroll $lineCount lines with cursor at $cursorRow to $expected',
      ({ lineCount, cursorRow, height, previous, expected }) => {
        expect(computeScrollOffset(lineCount, cursorRow, height, previous)).toBe(
          expected,
        );
      },
    );
  });

  describe('getVisibleRows', () => {
    const text = ['r0', 'r1', 'r2', 'r3', 'r4'].join('\n');

    it('should return the rows inside the window', () => {
      const composer = normalComposer(text, { height: 2 });
      press(composer, DOWN, DOWN);
      expect(composer.getScrollOffset()).toBe(1);
      expect(composer.getVisibleRows()).toEqual([
        { row: 1, text: 'r1', cursorCol: null, selection: null },
        { row: 2, text: 'r2', cursorCol: 0, selection: null },
      ]);
    });

    it('should mark selected columns per row', () => {
      const composer = normalComposer('abcd\nefgh\nijkl', { height: 3 });
      press(composer, 'lvjl');
      expect(getVisibleRows(composer.getState()).map((r) => r.selection)).toEqual(
        [
          [1, 5],
          [0, 3],
          null,
        ],
      );
    });
  });

  describe('setViewport', () => {
    it('should rescroll to keep the cursor visible', () => {
      const composer = normalComposer('a\nb\nc\nd', { height: 4 });
      press(composer, 'G');
      expect(composer.getScrollOffset()).toBe(0);
      composer.setViewport(40, 2);
      expect(composer.getViewport()).toEqual({
        width: 40,
        height: 2,
        scrollOffset: 2,
      });
    });

    it('should reject non-positive sizes', () => {
      const composer = press(new ModalComposer(), ESC);
      expect(() => composer.setViewport(0, 3)).toThrow(FatalConfigError);
      expect(() => composer.setViewport(10, 1.5)).toThrow(
        'height: expected a positive integer, got 1.5',
      );
    });
  });
});
