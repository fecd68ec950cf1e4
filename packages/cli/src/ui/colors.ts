/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ComposerMode } from '@modal-composer/core';

export const theme = {
  text: {
    primary: 'white',
    secondary: 'gray',
    accent: 'cyan',
  },
  border: {
    default: 'gray',
    focused: 'cyan',
  },
  mode: {
    NORMAL: 'blue',
    INSERT: 'green',
    VISUAL: 'magenta',
  } satisfies Record<ComposerMode, string>,
} as const;
