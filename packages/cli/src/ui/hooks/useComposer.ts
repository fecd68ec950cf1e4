/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useCallback, useState } from 'react';
import {
  Command,
  type ComposerState,
  type Key,
  type ModalComposer,
} from '@modal-composer/core';
import { composerHeight } from '../../config/config.js';

export interface UseComposerOptions {
  maxHeight: number;
  onSubmit: (text: string) => void;
  onQuit: () => void;
}

export interface UseComposerReturn {
  state: ComposerState;
  handleKey: (key: Key) => void;
}

/**
 * Drives a composer from host key events. Submit and quit are handled here,
 * matched against the composer's own bindings; every other key goes to the
 * engine. The viewport height follows the line
 * count up to `maxHeight`.
 */
export function useComposer(
  composer: ModalComposer,
  { maxHeight, onSubmit, onQuit }: UseComposerOptions,
): UseComposerReturn {
  const [state, setState] = useState(() => composer.getState());

  const sync = useCallback(() => {
    const { width, height } = composer.getViewport();
    const wanted = composerHeight(composer.getLines().length, maxHeight);
    if (wanted !== height) {
      composer.setViewport(width, wanted);
    }
    setState(composer.getState());
  }, [composer, maxHeight]);

  const handleKey = useCallback(
    (key: Key) => {
      const keyMatchers = composer.getKeyMatchers();
      if (keyMatchers[Command.QUIT](key)) {
        onQuit();
        return;
      }

      const submitting =
        keyMatchers[Command.SUBMIT](key) ||
        (composer.getMode() === 'NORMAL' && keyMatchers[Command.NEWLINE](key));
      if (submitting) {
        const text = composer.getText();
        if (text.trim() !== '') {
          onSubmit(text);
          composer.setText('');
        }
      } else {
        composer.handleKey(key);
      }
      sync();
    },
    [composer, onQuit, onSubmit, sync],
  );

  return { state, handleKey };
}
