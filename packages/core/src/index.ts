/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export config
export * from './config/composerConfig.js';
export * from './config/keyBindings.js';

// Export the composer engine
export * from './composer/composer.js';
export * from './composer/command-interpreter.js';
export * from './composer/key.js';
export { createKeyMatchers, keyMatchers } from './composer/keyMatchers.js';
export type { KeyMatchers } from './composer/keyMatchers.js';
export * from './composer/motions.js';
export * from './composer/operators.js';
export * from './composer/text-buffer.js';
export * from './composer/types.js';
export * from './composer/undo-history.js';
export * from './composer/viewport.js';

// Export utilities
export * from './utils/debugLogger.js';
export * from './utils/errors.js';
export * from './utils/textUtils.js';
