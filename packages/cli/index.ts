#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './src/playground.js';
import { FatalError, getErrorMessage } from '@modal-composer/core';

// --- Global Entry Point ---

main().catch((error: unknown) => {
  if (error instanceof FatalError) {
    let errorMessage = error.message;
    if (!process.env['NO_COLOR']) {
      errorMessage = `\x1b[31m${errorMessage}\x1b[0m`;
    }
    process.stderr.write(errorMessage + '\n');
    process.exit(error.exitCode);
  }
  process.stderr.write('An unexpected critical error occurred:\n');
  const details =
    error instanceof Error && error.stack ? error.stack : getErrorMessage(error);
  process.stderr.write(details + '\n');
  process.exit(1);
});
