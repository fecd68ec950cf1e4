/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  firstNonBlankColumn,
  motionForChar,
  nextWordEnd,
  nextWordStart,
  prevWordStart,
  resolveMotion,
} from './motions.js';

describe('motions', () => {
  describe('nextWordStart', () => {
    it('should stop at punctuation for small words only', () => {
      const lines = ['foo.bar baz'];
      expect(nextWordStart(lines, { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 3,
      });
      expect(nextWordStart(lines, { row: 0, col: 3 }, false)).toEqual({
        row: 0,
        col: 4,
      });
      expect(nextWordStart(lines, { row: 0, col: 0 }, true)).toEqual({
        row: 0,
        col: 8,
      });
    });

    it('should land at column 0 of the next line', () => {
      expect(nextWordStart(['foo', '  bar'], { row: 0, col: 0 }, false)).toEqual(
        { row: 1, col: 0 },
      );
    });

    it('should stop at the end of the last line', () => {
      expect(nextWordStart(['foo'], { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 3,
      });
    });

    it('should count columns in code points', () => {
      const lines = ['a😀 b'];
      expect(nextWordStart(lines, { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 1,
      });
      expect(nextWordStart(lines, { row: 0, col: 1 }, false)).toEqual({
        row: 0,
        col: 3,
      });
      expect(nextWordStart(['héllo wörld'], { row: 0, col: 0 }, false)).toEqual(
        { row: 0, col: 6 },
      );
    });
  });

  describe('prevWordStart', () => {
    it('should move to the start of the previous word', () => {
      expect(prevWordStart(['foo bar'], { row: 0, col: 4 }, false)).toEqual({
        row: 0,
        col: 0,
      });
      expect(prevWordStart(['foo   bar'], { row: 0, col: 6 }, false)).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('should move to the start of the current word from inside it', () => {
      expect(prevWordStart(['foo bar'], { row: 0, col: 6 }, false)).toEqual({
        row: 0,
        col: 4,
      });
    });

    it('should cross to the previous line', () => {
      expect(prevWordStart(['foo', 'bar'], { row: 1, col: 0 }, false)).toEqual({
        row: 0,
        col: 0,
      });
      expect(
        prevWordStart(['foo', '', 'bar'], { row: 2, col: 0 }, false),
      ).toEqual({ row: 0, col: 0 });
    });

    it('should stay put at the start of the buffer', () => {
      expect(prevWordStart(['foo'], { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 0,
      });
    });
  });

  describe('nextWordEnd', () => {
    it('should advance to the end of the current or next word', () => {
      const lines = ['foo bar'];
      expect(nextWordEnd(lines, { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 2,
      });
      expect(nextWordEnd(lines, { row: 0, col: 2 }, false)).toEqual({
        row: 0,
        col: 6,
      });
    });

    it('should return null when no word follows', () => {
      expect(nextWordEnd(['foo bar'], { row: 0, col: 6 }, false)).toBeNull();
      expect(nextWordEnd(['foo  '], { row: 0, col: 2 }, false)).toBeNull();
    });

    it('should search across lines', () => {
      expect(nextWordEnd(['foo', '  bar'], { row: 0, col: 2 }, false)).toEqual({
        row: 1,
        col: 4,
      });
    });

    it('should treat punctuation runs as words unless big', () => {
      expect(nextWordEnd(['ab.cd'], { row: 0, col: 0 }, false)).toEqual({
        row: 0,
        col: 1,
      });
      expect(nextWordEnd(['ab.cd'], { row: 0, col: 0 }, true)).toEqual({
        row: 0,
        col: 4,
      });
    });
  });

  describe('resolveMotion', () => {
    const lines = ['abcdef', 'ab', '  xyz'];

    it('should clamp horizontal moves to the line', () => {
      expect(
        resolveMotion(lines, { row: 0, col: 1 }, 'left', 3, 'NORMAL'),
      ).toEqual({ row: 0, col: 0, inclusive: false });
      expect(
        resolveMotion(lines, { row: 1, col: 0 }, 'right', 5, 'NORMAL'),
      ).toEqual({ row: 1, col: 2, inclusive: false });
    });

    it('should revalidate the column on vertical moves', () => {
      expect(
        resolveMotion(lines, { row: 0, col: 5 }, 'down', undefined, 'NORMAL'),
      ).toEqual({ row: 1, col: 1, inclusive: false });
      expect(
        resolveMotion(lines, { row: 0, col: 5 }, 'down', undefined, 'INSERT'),
      ).toEqual({ row: 1, col: 2, inclusive: false });
      expect(
        resolveMotion(lines, { row: 1, col: 0 }, 'up', 9, 'NORMAL'),
      ).toEqual({ row: 0, col: 0, inclusive: false });
    });

    it('should resolve line-local motions', () => {
      const at = { row: 2, col: 3 };
      expect(resolveMotion(lines, at, 'lineStart', undefined, 'NORMAL').col).toBe(
        0,
      );
      expect(
        resolveMotion(lines, at, 'firstNonBlank', undefined, 'NORMAL').col,
      ).toBe(2);
      expect(resolveMotion(lines, at, 'lineEnd', undefined, 'NORMAL').col).toBe(
        5,
      );
    });

    it('should jump to counted or boundary lines', () => {
      const at = { row: 1, col: 1 };
      expect(
        resolveMotion(lines, at, 'documentLine', undefined, 'NORMAL'),
      ).toEqual({ row: 2, col: 0, inclusive: false });
      expect(resolveMotion(lines, at, 'documentLine', 1, 'NORMAL')).toEqual({
        row: 0,
        col: 0,
        inclusive: false,
      });
      expect(resolveMotion(lines, at, 'documentLine', 99, 'NORMAL').row).toBe(2);
      expect(
        resolveMotion(lines, at, 'documentStart', undefined, 'NORMAL').row,
      ).toBe(0);
      expect(resolveMotion(lines, at, 'documentStart', 2, 'NORMAL').row).toBe(1);
    });

    it('should tag word-end targets as inclusive', () => {
      expect(
        resolveMotion(['foo bar'], { row: 0, col: 0 }, 'wordEnd', 2, 'NORMAL'),
      ).toEqual({ row: 0, col: 6, inclusive: true });
      expect(
        resolveMotion(['foo'], { row: 0, col: 2 }, 'wordEnd', 1, 'NORMAL'),
      ).toEqual({ row: 0, col: 2, inclusive: false });
      expect(
        resolveMotion(['foo bar'], { row: 0, col: 0 }, 'wordForward', 1, 'NORMAL')
          .inclusive,
      ).toBe(false);
    });
  });

  it('should map keys to motions', () => {
    expect(motionForChar('w')).toBe('wordForward');
    expect(motionForChar('_')).toBe('firstNonBlank');
    expect(motionForChar('x')).toBeUndefined();
    expect(motionForChar('toString')).toBeUndefined();
  });

  it('should find the first non-blank column', () => {
    expect(firstNonBlankColumn('   x')).toBe(3);
    expect(firstNonBlankColumn('   ')).toBe(0);
    expect(firstNonBlankColumn('\tword')).toBe(1);
  });
});
