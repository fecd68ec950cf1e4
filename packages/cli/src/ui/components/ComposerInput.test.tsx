/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink-testing-library';
import stripAnsi from 'strip-ansi';
import { describe, it, expect } from 'vitest';
import { ComposerInput } from './ComposerInput.js';

describe('ComposerInput', () => {
  it('renders one line per visible row', () => {
    const { lastFrame } = render(
      <ComposerInput
        rows={[
          { row: 3, text: 'one', cursorCol: null, selection: null },
          { row: 4, text: 'two', cursorCol: 1, selection: null },
        ]}
        placeholder="Say hi"
        isEmpty={false}
      />,
    );
    expect(stripAnsi(lastFrame() ?? '')).toBe('one\ntwo');
  });

  it('renders the placeholder while empty', () => {
    const { lastFrame } = render(
      <ComposerInput
        rows={[{ row: 0, text: '', cursorCol: 0, selection: null }]}
        placeholder="Say hi"
        isEmpty={true}
      />,
    );
    expect(stripAnsi(lastFrame() ?? '')).toBe('Say hi');
  });
});
