/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { Command, createKeyMatchers, keyMatchers } from './keyMatchers.js';
import { mergeKeyBindings } from '../config/keyBindings.js';
import { charKey, namedKey, printableText } from './key.js';

describe('keyMatchers', () => {
  it('should match escape and ctrl+[ as ESCAPE', () => {
    expect(keyMatchers[Command.ESCAPE](namedKey('escape'))).toBe(true);
    expect(keyMatchers[Command.ESCAPE](namedKey('[', { ctrl: true }))).toBe(
      true,
    );
    expect(keyMatchers[Command.ESCAPE](charKey('['))).toBe(false);
  });

  it('should reject arrows pressed with modifiers', () => {
    expect(keyMatchers[Command.MOVE_LEFT](namedKey('left'))).toBe(true);
    expect(keyMatchers[Command.MOVE_LEFT](namedKey('left', { ctrl: true }))).toBe(
      false,
    );
  });

  it('should only treat ctrl+r as REDO', () => {
    expect(keyMatchers[Command.REDO](namedKey('r', { ctrl: true }))).toBe(true);
    expect(keyMatchers[Command.REDO](charKey('r'))).toBe(false);
  });

  it('should honour overridden bindings', () => {
    const matchers = createKeyMatchers(
      mergeKeyBindings({ [Command.SUBMIT]: [{ key: 'return', alt: true }] }),
    );
    expect(matchers[Command.SUBMIT](namedKey('return', { alt: true }))).toBe(
      true,
    );
    expect(matchers[Command.SUBMIT](namedKey('s', { ctrl: true }))).toBe(false);
    expect(matchers[Command.REDO](namedKey('r', { ctrl: true }))).toBe(true);
  });
});

describe('key helpers', () => {
  it('should describe typed characters', () => {
    const key = charKey('G');
    expect(key.name).toBe('g');
    expect(key.shift).toBe(true);
    expect(printableText(key)).toBe('G');
  });

  it('should give named keys no printable text', () => {
    expect(printableText(namedKey('return'))).toBe('');
    expect(printableText({ ...charKey('r'), ctrl: true })).toBe('');
  });

  it('should keep pasted text together', () => {
    const key = charKey('one\ntwo');
    expect(key.name).toBe('');
    expect(printableText(key)).toBe('one\ntwo');
  });
});
