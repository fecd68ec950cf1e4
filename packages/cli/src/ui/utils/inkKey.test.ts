/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { charKey, keyMatchers, Command, namedKey } from '@modal-composer/core';
import { toComposerKey, type InkKeyEvent } from './inkKey.js';

const inkKey = (overrides: Partial<InkKeyEvent> = {}): InkKeyEvent => ({
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  return: false,
  escape: false,
  ctrl: false,
  shift: false,
  tab: false,
  backspace: false,
  delete: false,
  meta: false,
  ...overrides,
});

describe('toComposerKey', () => {
  it('should map named keys', () => {
    expect(toComposerKey('', inkKey({ escape: true }))).toEqual(
      namedKey('escape'),
    );
    expect(toComposerKey('', inkKey({ upArrow: true }))).toEqual(
      namedKey('up'),
    );
    expect(toComposerKey('', inkKey({ tab: true, shift: true }))).toEqual(
      namedKey('tab', { shift: true }),
    );
  });

  it('should treat delete as backspace', () => {
    const key = toComposerKey('', inkKey({ delete: true }));
    expect(key?.name).toBe('backspace');
    expect(key && keyMatchers[Command.DELETE_CHAR_LEFT](key)).toBe(true);
    expect(key && keyMatchers[Command.DELETE_CHAR_RIGHT](key)).toBe(false);
  });

  it('should map ctrl chords to named keys', () => {
    const key = toComposerKey('r', inkKey({ ctrl: true }));
    expect(key).toEqual(namedKey('r', { ctrl: true }));
    expect(key && keyMatchers[Command.REDO](key)).toBe(true);
  });

  it('should pass printable text through', () => {
    expect(toComposerKey('X', inkKey({ shift: true }))).toEqual(charKey('X'));
    expect(toComposerKey('pasted', inkKey())).toEqual(charKey('pasted'));
    expect(toComposerKey('x', inkKey({ meta: true }))?.alt).toBe(true);
  });

  it('should ignore events without a name', () => {
    expect(toComposerKey('', inkKey())).toBeNull();
  });
});
