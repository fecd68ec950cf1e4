/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ModalComposer } from '../composer/composer.js';
import { keysFromText, namedKey } from '../composer/key.js';
import type { Key } from '../composer/key.js';
import type { ComposerOptions } from '../config/composerConfig.js';

export const ESC: Key = namedKey('escape');
export const ENTER: Key = namedKey('return');
export const BACKSPACE: Key = namedKey('backspace');
export const DELETE: Key = namedKey('delete');
export const TAB: Key = namedKey('tab');
export const CTRL_R: Key = namedKey('r', { ctrl: true });
export const LEFT: Key = namedKey('left');
export const RIGHT: Key = namedKey('right');
export const UP: Key = namedKey('up');
export const DOWN: Key = namedKey('down');

/**
 * Feeds keys to the composer. Strings are typed one code point at a time.
 */
export function press(
  composer: ModalComposer,
  ...keys: Array<string | Key>
): ModalComposer {
  for (const key of keys) {
    const events = typeof key === 'string' ? keysFromText(key) : [key];
    for (const event of events) {
      composer.handleKey(event);
    }
  }
  return composer;
}

/** A composer holding `text`, already switched to Normal mode at (0, 0). */
export function normalComposer(
  text: string,
  options: Omit<ComposerOptions, 'initialText'> = {},
): ModalComposer {
  return press(new ModalComposer({ ...options, initialText: text }), ESC);
}
