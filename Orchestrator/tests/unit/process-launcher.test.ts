import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { ChildProcessLauncher, type ManagedProcess } from '../../src/deployment/process-launcher.js';
import { makeTempDir } from '../helpers/agents.js';

vi.mock('@flotilla/shared/Utils/logger.js', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: { child: () => log }, Logger: class {} };
});

describe('ChildProcessLauncher', () => {
  let cwd: string;
  let launched: ManagedProcess[];
  const launcher = new ChildProcessLauncher();

  function shell(script: string): ManagedProcess {
    const proc = launcher.launch({ command: 'sh', args: ['-c', script], cwd }, 'test');
    launched.push(proc);
    return proc;
  }

  beforeEach(() => {
    cwd = makeTempDir('launcher');
    launched = [];
  });

  afterEach(async () => {
    for (const proc of launched) {
      proc.kill();
      await proc.waitForExit(1000);
    }
    rmSync(cwd, { recursive: true, force: true });
  });

  it('captures both output streams', async () => {
    const proc = shell('echo out; echo err >&2');

    expect(await proc.waitForExit(2000)).toBe(true);
    expect(proc.exitCode).toBe(0);
    expect(proc.output()).toEqual({ stdout: 'out\n', stderr: 'err\n' });
  });

  it('replaces bytes that are not valid UTF-8', async () => {
    const proc = shell("printf 'hi\\377'");

    await proc.waitForExit(2000);

    expect(proc.output().stdout).toBe('hi\uFFFD');
  });

  it('reports the exit even while a background child keeps the pipes open', async () => {
    const proc = shell('sleep 3 & exit 3');

    expect(await proc.waitForExit(1000)).toBe(true);
    expect(proc.isAlive()).toBe(false);
    expect(proc.exitCode).toBe(3);
  });

  it('stops a process with SIGTERM', async () => {
    const proc = shell('exec sleep 5');
    expect(proc.isAlive()).toBe(true);

    proc.terminate();

    expect(await proc.waitForExit(2000)).toBe(true);
    expect(proc.exitCode).toBeNull();
  });

  it('needs SIGKILL for a process that ignores SIGTERM', async () => {
    const proc = shell("trap '' TERM; echo ready; exec sleep 5");
    await vi.waitFor(() => expect(proc.output().stdout).toBe('ready\n'));

    proc.terminate();
    expect(await proc.waitForExit(300)).toBe(false);
    expect(proc.isAlive()).toBe(true);

    proc.kill();
    expect(await proc.waitForExit(2000)).toBe(true);
    expect(proc.isAlive()).toBe(false);
  });

  it('records a spawn failure', async () => {
    const proc = launcher.launch({ command: 'flotilla-no-such-command', args: [], cwd }, 'test');

    expect(await proc.waitForExit(2000)).toBe(true);
    expect(proc.spawnError?.message).toContain('ENOENT');
    expect(proc.isAlive()).toBe(false);
  });
});
