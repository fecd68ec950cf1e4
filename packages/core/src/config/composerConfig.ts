/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { Command, mergeKeyBindings } from './keyBindings.js';
import type { KeyBindingConfig } from './keyBindings.js';
import { DebugLogger, quietLogger } from '../utils/debugLogger.js';
import { FatalConfigError } from '../utils/errors.js';

export const DEFAULT_WIDTH = 80;
export const DEFAULT_HEIGHT = 1;
export const DEFAULT_UNDO_LIMIT = 100;

const keyBindingSchema = z
  .object({
    key: z.string().min(1),
    shift: z.boolean().optional(),
    alt: z.boolean().optional(),
    ctrl: z.boolean().optional(),
    cmd: z.boolean().optional(),
  })
  .strict();

const dimension = z.number().int().positive();

export const composerOptionsSchema = z
  .object({
    initialText: z.string().default(''),
    placeholder: z.string().default(''),
    width: dimension.default(DEFAULT_WIDTH),
    height: dimension.default(DEFAULT_HEIGHT),
    undoLimit: dimension.default(DEFAULT_UNDO_LIMIT),
    keyBindings: z
      .record(z.nativeEnum(Command), z.array(keyBindingSchema))
      .default({}),
    logger: z.instanceof(DebugLogger).optional(),
  })
  .strict();

/** Options accepted by the composer constructor. */
export type ComposerOptions = z.input<typeof composerOptionsSchema>;

export interface ResolvedComposerOptions {
  initialText: string;
  placeholder: string;
  width: number;
  height: number;
  undoLimit: number;
  keyBindings: KeyBindingConfig;
  logger: DebugLogger;
}

/**
 * Format a Zod error into one line per issue, prefixed with its path.
 */
export function formatValidationError(error: z.ZodError): string {
  const lines = ['Invalid composer options:'];
  for (const issue of error.issues) {
    const path = issue.path.reduce<string>(
      (acc, curr) =>
        typeof curr === 'number'
          ? `${acc}[${curr}]`
          : `${acc ? acc + '.' : ''}${curr}`,
      '',
    );
    lines.push(`  ${path || '(root)'}: ${issue.message}`);
  }
  return lines.join('\n');
}

/**
 * Validates constructor options and fills in defaults.
 *
 * @throws {FatalConfigError} listing every invalid option.
 */
export function resolveComposerOptions(
  options: unknown = {},
): ResolvedComposerOptions {
  const result = composerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new FatalConfigError(formatValidationError(result.error));
  }
  const { keyBindings, logger, ...rest } = result.data;
  return {
    ...rest,
    keyBindings: mergeKeyBindings(keyBindings),
    logger: logger ?? quietLogger,
  };
}
