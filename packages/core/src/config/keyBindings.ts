/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Named keys the composer reacts to. Printable characters (the Normal and
 * Visual mode command letters) are matched on the character itself and are
 * not rebindable.
 */
export enum Command {
  // Mode control
  ESCAPE = 'basic.cancel',
  QUIT = 'basic.quit',

  // Cursor movement
  MOVE_UP = 'cursor.up',
  MOVE_DOWN = 'cursor.down',
  MOVE_LEFT = 'cursor.left',
  MOVE_RIGHT = 'cursor.right',

  // Editing
  NEWLINE = 'input.newline',
  INSERT_TAB = 'input.tab',
  DELETE_CHAR_LEFT = 'edit.deleteLeft',
  DELETE_CHAR_RIGHT = 'edit.deleteRight',
  REDO = 'edit.redo',

  // Host
  SUBMIT = 'input.submit',
}

/**
 * Data-driven key binding structure for user configuration
 */
export interface KeyBinding {
  /** The key name (e.g., 'a', 'return', 'tab', 'escape') */
  key: string;
  /** Shift key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  shift?: boolean;
  /** Alt/Option key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  alt?: boolean;
  /** Control key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  ctrl?: boolean;
  /** Command/Windows/Super key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  cmd?: boolean;
}

/**
 * Configuration type mapping commands to their key bindings
 */
export type KeyBindingConfig = {
  readonly [C in Command]: readonly KeyBinding[];
};

export type KeyBindingOverrides = {
  readonly [C in Command]?: readonly KeyBinding[];
};

export const defaultKeyBindings: KeyBindingConfig = {
  [Command.ESCAPE]: [{ key: 'escape' }, { key: '[', ctrl: true }],
  [Command.QUIT]: [{ key: 'c', ctrl: true }],

  [Command.MOVE_UP]: [
    { key: 'up', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_DOWN]: [
    { key: 'down', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_LEFT]: [
    { key: 'left', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_RIGHT]: [
    { key: 'right', shift: false, alt: false, ctrl: false, cmd: false },
  ],

  [Command.NEWLINE]: [{ key: 'return' }],
  [Command.INSERT_TAB]: [{ key: 'tab', shift: false }],
  [Command.DELETE_CHAR_LEFT]: [{ key: 'backspace' }, { key: 'h', ctrl: true }],
  [Command.DELETE_CHAR_RIGHT]: [{ key: 'delete' }],
  [Command.REDO]: [{ key: 'r', ctrl: true }],

  [Command.SUBMIT]: [{ key: 's', ctrl: true }],
};

/** Replaces the bindings of every command named in `overrides`. */
export function mergeKeyBindings(
  overrides: KeyBindingOverrides = {},
  base: KeyBindingConfig = defaultKeyBindings,
): KeyBindingConfig {
  return { ...base, ...overrides };
}
