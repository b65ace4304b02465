/**
 * Tests for the sandbox CLI gateway.
 */

import { describe, it, expect } from 'vitest';
import { SandboxCliGateway, listIncludesSandbox } from '../sandbox.js';
import { exit, ok, scriptedRunner } from './runner.js';

const LISTING = 'NAME                      STATUS\nwork-issue-app-github-1   running\nwork-issue-app-github-10  stopped\n';

describe('listIncludesSandbox', () => {
  it('matches whole names only', () => {
    expect(listIncludesSandbox(LISTING, 'work-issue-app-github-1')).toBe(true);
    expect(listIncludesSandbox(LISTING, 'work-issue-app-github')).toBe(false);
    expect(listIncludesSandbox(LISTING, 'work-issue-app-github-2')).toBe(false);
  });
});

describe('SandboxCliGateway', () => {
  it('checks existence from the listing', async () => {
    const run = scriptedRunner({ list: ok(LISTING) });
    const sandbox = new SandboxCliGateway({ run });
    expect(await sandbox.sandboxExists('work-issue-app-github-10')).toBe(true);
  });

  it('deletes without prompting', async () => {
    const run = scriptedRunner();
    await new SandboxCliGateway({ run, binary: 'sbx' }).deleteSandbox('work-1');
    expect(run).toHaveBeenCalledWith('sbx', ['delete', 'work-1', '-y'], { timeoutMs: 30_000 });
  });

  it('reads a file with its own timeout', async () => {
    const run = scriptedRunner({ '--name work-1 cat .worksession/stop.json': ok('{}') });
    const sandbox = new SandboxCliGateway({ run });
    expect(await sandbox.readFile('work-1', '.worksession/stop.json', { timeoutMs: 5000 })).toBe('{}');
    expect(run).toHaveBeenCalledWith('sandbox', ['--name', 'work-1', 'cat', '.worksession/stop.json'], { timeoutMs: 5000 });
  });

  it('reports a failed listing', async () => {
    const run = scriptedRunner({ list: exit(3) });
    await expect(new SandboxCliGateway({ run }).sandboxExists('work-1')).rejects.toThrow(
      'failed to list sandboxes: exit status 3',
    );
  });
});
