/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import type { ComposerMode } from '@modal-composer/core';
import { theme } from '../colors.js';

interface ModeIndicatorProps {
  mode: ComposerMode;
}

const HINTS: Record<ComposerMode, string> = {
  NORMAL: 'enter to send · i to insert',
  INSERT: 'esc for normal · ctrl+s to send',
  VISUAL: 'd/y/c on selection · esc to cancel',
};

export const ModeIndicator: React.FC<ModeIndicatorProps> = ({ mode }) => (
  <Box>
    <Text color={theme.mode[mode]} bold>
      {mode}
      <Text color={theme.text.secondary} bold={false}>
        {' '}
        {HINTS[mode]}
      </Text>
    </Text>
  </Box>
);
