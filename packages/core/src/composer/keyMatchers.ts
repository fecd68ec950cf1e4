/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key } from './key.js';
import type { KeyBinding, KeyBindingConfig } from '../config/keyBindings.js';
import { Command, defaultKeyBindings } from '../config/keyBindings.js';

/**
 * Matches a KeyBinding against an actual Key press
 * Pure data-driven matching logic
 */
function matchKeyBinding(keyBinding: KeyBinding, key: Key): boolean {
  // undefined = ignore this modifier
  // true = modifier must be pressed
  // false = modifier must NOT be pressed
  return (
    keyBinding.key === key.name &&
    (keyBinding.shift === undefined || key.shift === keyBinding.shift) &&
    (keyBinding.alt === undefined || key.alt === keyBinding.alt) &&
    (keyBinding.ctrl === undefined || key.ctrl === keyBinding.ctrl) &&
    (keyBinding.cmd === undefined || key.cmd === keyBinding.cmd)
  );
}

function matchCommand(
  command: Command,
  key: Key,
  config: KeyBindingConfig = defaultKeyBindings,
): boolean {
  const bindings = config[command];
  return bindings.some((binding) => matchKeyBinding(binding, key));
}

type KeyMatcher = (key: Key) => boolean;

export type KeyMatchers = {
  readonly [C in Command]: KeyMatcher;
};

/**
 * Creates key matchers from a key binding configuration
 */
export function createKeyMatchers(
  config: KeyBindingConfig = defaultKeyBindings,
): KeyMatchers {
  const matcher =
    (command: Command): KeyMatcher =>
    (key) =>
      matchCommand(command, key, config);

  return {
    [Command.ESCAPE]: matcher(Command.ESCAPE),
    [Command.QUIT]: matcher(Command.QUIT),
    [Command.MOVE_UP]: matcher(Command.MOVE_UP),
    [Command.MOVE_DOWN]: matcher(Command.MOVE_DOWN),
    [Command.MOVE_LEFT]: matcher(Command.MOVE_LEFT),
    [Command.MOVE_RIGHT]: matcher(Command.MOVE_RIGHT),
    [Command.NEWLINE]: matcher(Command.NEWLINE),
    [Command.INSERT_TAB]: matcher(Command.INSERT_TAB),
    [Command.DELETE_CHAR_LEFT]: matcher(Command.DELETE_CHAR_LEFT),
    [Command.DELETE_CHAR_RIGHT]: matcher(Command.DELETE_CHAR_RIGHT),
    [Command.REDO]: matcher(Command.REDO),
    [Command.SUBMIT]: matcher(Command.SUBMIT),
  };
}

/**
 * Default key binding matchers using the default configuration
 */
export const keyMatchers: KeyMatchers = createKeyMatchers(defaultKeyBindings);

export { Command };
