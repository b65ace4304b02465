/**
 * Tests for confirmation answers.
 */

import { describe, it, expect } from 'vitest';
import { isYes } from '../prompt.js';

describe('isYes', () => {
  it.each(['y', 'Y', 'yes', ' YES '])('accepts %j', (answer) => {
    expect(isYes(answer)).toBe(true);
  });

  it.each(['', 'n', 'no', 'yep', 'sure'])('refuses %j', (answer) => {
    expect(isYes(answer)).toBe(false);
  });
});
