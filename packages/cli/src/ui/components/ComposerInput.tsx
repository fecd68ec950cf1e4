/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import chalk from 'chalk';
import type { VisibleRow } from '@modal-composer/core';
import { theme } from '../colors.js';
import { formatRow } from '../utils/rowFormatting.js';

interface ComposerInputProps {
  rows: readonly VisibleRow[];
  placeholder: string;
  isEmpty: boolean;
}

export const ComposerInput: React.FC<ComposerInputProps> = ({
  rows,
  placeholder,
  isEmpty,
}) => {
  if (isEmpty && placeholder) {
    return (
      <Box>
        <Text>
          {chalk.inverse(placeholder[0] || ' ')}
          <Text color={theme.text.secondary}>{placeholder.slice(1)}</Text>
        </Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      {rows.map((row) => (
        <Box key={row.row} height={1}>
          <Text>{formatRow(row)}</Text>
        </Box>
      ))}
    </Box>
  );
};
