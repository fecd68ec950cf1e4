/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A single key event. Printable input arrives with `insertable` set and the
 * text in `sequence` (a paste may carry several characters); named keys such
 * as 'escape', 'return' or 'left' arrive in `name`.
 */
export interface Key {
  name: string;
  shift: boolean;
  alt: boolean;
  ctrl: boolean;
  cmd: boolean; // Command/Windows/Super key
  insertable: boolean;
  sequence: string;
}

export type KeyModifiers = Partial<Pick<Key, 'shift' | 'alt' | 'ctrl' | 'cmd'>>;

/** Builds the event for typed or pasted text. */
export function charKey(text: string): Key {
  const single = Array.from(text).length === 1;
  return {
    name: single ? text.toLowerCase() : '',
    shift: single && text !== text.toLowerCase(),
    alt: false,
    ctrl: false,
    cmd: false,
    insertable: true,
    sequence: text,
  };
}

/** Builds the event for a named key such as 'escape' or ctrl+'r'. */
export function namedKey(name: string, modifiers: KeyModifiers = {}): Key {
  return {
    name,
    shift: modifiers.shift ?? false,
    alt: modifiers.alt ?? false,
    ctrl: modifiers.ctrl ?? false,
    cmd: modifiers.cmd ?? false,
    insertable: false,
    sequence: '',
  };
}

/** Splits `text` into one key event per code point. */
export function keysFromText(text: string): Key[] {
  return Array.from(text).map((ch) => charKey(ch));
}

/**
 * The printable text a key carries, or '' for named keys and modified
 * chords.
 */
export function printableText(key: Key): string {
  if (!key.insertable || key.ctrl || key.alt || key.cmd) {
    return '';
  }
  return key.sequence;
}
