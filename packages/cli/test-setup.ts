/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, afterEach } from 'vitest';

// Unset NO_COLOR so frames render the same locally and in CI
if (process.env['NO_COLOR'] !== undefined) {
  delete process.env['NO_COLOR'];
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});
