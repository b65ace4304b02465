/**
 * Tests for the start command's session overrides.
 */

import { describe, it, expect } from 'vitest';
import { WorkSessionError } from '../../core/errors.js';
import { sessionOverrides } from '../commands/start.js';

describe('sessionOverrides', () => {
  it('changes nothing without command flags', () => {
    expect(sessionOverrides({ title: 'Add cache' })).toEqual({});
  });

  it('turns --no-command into noCommand', () => {
    expect(sessionOverrides({ command: false })).toEqual({ noCommand: true });
  });

  it('splits --command into the command and its arguments', () => {
    expect(sessionOverrides({ command: '  npm run dev -- $1 ' })).toEqual({
      command: 'npm',
      commandArgs: ['run', 'dev', '--', '$1'],
      noCommand: false,
    });
  });

  it('rejects a blank --command', () => {
    expect(() => sessionOverrides({ command: '   ' })).toThrow(WorkSessionError);
    expect(() => sessionOverrides({ command: '   ' })).toThrow('--command cannot be empty');
  });
});
