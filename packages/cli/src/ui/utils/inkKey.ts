/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key as InkKey } from 'ink';
import { charKey, namedKey, type Key } from '@modal-composer/core';

export type InkKeyEvent = Pick<
  InkKey,
  | 'escape'
  | 'return'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'shift'
  | 'meta'
  | 'ctrl'
>;

/**
 * Converts an Ink `useInput` event into a composer key, or `null` for events
 * the composer has no name for.
 *
 * Most terminals send DEL for Backspace and Ink reports it as `delete`, so
 * both map to 'backspace'. Ink also reports the forward Delete key as
 * `delete`, so this host cannot tell the two apart and never sends
 * `Command.DELETE_CHAR_RIGHT`.
 */
export function toComposerKey(input: string, key: InkKeyEvent): Key | null {
  const modifiers = { shift: key.shift, alt: key.meta, ctrl: key.ctrl };

  if (key.escape) return namedKey('escape', modifiers);
  if (key.return) return namedKey('return', modifiers);
  if (key.tab) return namedKey('tab', modifiers);
  if (key.backspace || key.delete) return namedKey('backspace', modifiers);
  if (key.upArrow) return namedKey('up', modifiers);
  if (key.downArrow) return namedKey('down', modifiers);
  if (key.leftArrow) return namedKey('left', modifiers);
  if (key.rightArrow) return namedKey('right', modifiers);

  if (input === '') {
    return null;
  }
  if (key.ctrl) {
    return namedKey(input.toLowerCase(), modifiers);
  }
  return { ...charKey(input), alt: key.meta };
}
