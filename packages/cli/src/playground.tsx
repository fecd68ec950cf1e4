/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import React from 'react';
import { ModalComposer } from '@modal-composer/core';
import { App } from './ui/App.js';
import { loadComposerOptions, parseArguments } from './config/config.js';

export async function main(): Promise<void> {
  const args = parseArguments();
  const options = loadComposerOptions(args, process.stdout.columns || 80);
  const composer = new ModalComposer(options);
  options.logger?.debug(
    `composer started: width=${options.width} maxHeight=${args.maxHeight}`,
  );

  const instance = render(
    process.env['DEBUG'] ? (
      <React.StrictMode>
        <App
          composer={composer}
          maxHeight={args.maxHeight}
          onQuit={() => instance.unmount()}
        />
      </React.StrictMode>
    ) : (
      <App
        composer={composer}
        maxHeight={args.maxHeight}
        onQuit={() => instance.unmount()}
      />
    ),
    { exitOnCtrlC: false },
  );

  await instance.waitUntilExit();
  await options.logger?.close();
}
