/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useCallback, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { getVisibleRows, type ModalComposer } from '@modal-composer/core';
import { ComposerInput } from './components/ComposerInput.js';
import { ModeIndicator } from './components/ModeIndicator.js';
import { useComposer } from './hooks/useComposer.js';
import { toComposerKey } from './utils/inkKey.js';
import { theme } from './colors.js';

interface AppProps {
  composer: ModalComposer;
  maxHeight: number;
  onSubmit?: (text: string) => void;
  onQuit: () => void;
}

export const App = ({ composer, maxHeight, onSubmit, onQuit }: AppProps) => {
  const [messages, setMessages] = useState<string[]>([]);

  const handleSubmit = useCallback(
    (text: string) => {
      setMessages((prev) => [...prev, text]);
      onSubmit?.(text);
    },
    [onSubmit],
  );

  const { state, handleKey } = useComposer(composer, {
    maxHeight,
    onSubmit: handleSubmit,
    onQuit,
  });

  useInput((input, key) => {
    const composerKey = toComposerKey(input, key);
    if (composerKey) {
      handleKey(composerKey);
    }
  });

  const isEmpty = state.lines.length === 1 && state.lines[0] === '';

  return (
    <Box flexDirection="column">
      {messages.map((message, index) => (
        <Box key={index} marginBottom={1}>
          <Text color={theme.text.accent}>{'> '}</Text>
          <Text>{message}</Text>
        </Box>
      ))}
      <Box
        borderStyle="round"
        borderColor={
          state.mode === 'INSERT' ? theme.border.focused : theme.border.default
        }
        paddingX={1}
      >
        <ComposerInput
          rows={getVisibleRows(state)}
          placeholder={composer.getPlaceholder()}
          isEmpty={isEmpty}
        />
      </Box>
      <ModeIndicator mode={state.mode} />
    </Box>
  );
};
