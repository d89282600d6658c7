import { spawn, type ChildProcess } from 'node:child_process';
import { logger } from '@flotilla/shared/Utils/logger.js';

const log = logger.child('process');

/** Bytes of stdout/stderr kept per stream for diagnostics */
export const OUTPUT_CAPTURE_BYTES = 64 * 1024;

/** How long to keep reading output after the process itself has exited */
export const OUTPUT_DRAIN_MS = 250;

export interface LaunchSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface CapturedOutput {
  stdout: string;
  stderr: string;
}

/**
 * Handle on a supervised OS process.
 */
export interface ManagedProcess {
  readonly pid: number | undefined;
  /** Exit code once the process has exited; null while running or when killed by a signal */
  readonly exitCode: number | null;
  /** Set when the OS refused to start the process (ENOENT, EACCES...) */
  readonly spawnError: Error | null;
  isAlive(): boolean;
  /** Captured output, decoded as UTF-8 with invalid bytes replaced */
  output(): CapturedOutput;
  /** Polite stop (SIGTERM) */
  terminate(): void;
  /** Forced stop (SIGKILL) */
  kill(): void;
  /** Resolves true once the process has exited, false if `timeoutMs` elapses first */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec, label: string): ManagedProcess;
}

/**
 * Keeps the tail of a byte stream, dropping the oldest chunks past the limit.
 */
class BoundedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped ? dropped.length : 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    const tail = joined.length > this.limit ? joined.subarray(joined.length - this.limit) : joined;
    return tail.toString('utf8');
  }
}

class ChildManagedProcess implements ManagedProcess {
  /** The process itself is gone */
  private exited = false;
  /** Output is drained (or the drain bound passed) and waiters have been released */
  private settled = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private code: number | null = null;
  private error: Error | null = null;
  private readonly stdout = new BoundedBuffer(OUTPUT_CAPTURE_BYTES);
  private readonly stderr = new BoundedBuffer(OUTPUT_CAPTURE_BYTES);
  private readonly exitWaiters = new Set<() => void>();

  constructor(private readonly child: ChildProcess, label: string) {
    const prefix = `[agent:${label}]`;
    child.stdout?.on('data', (data: Buffer) => {
      this.stdout.push(data);
      for (const line of data.toString().split('\n').filter(Boolean)) {
        log.debug(`${prefix} ${line}`);
      }
    });
    child.stderr?.on('data', (data: Buffer) => {
      this.stderr.push(data);
      for (const line of data.toString().split('\n').filter(Boolean)) {
        log.debug(`${prefix} ${line}`);
      }
    });

    child.on('error', (error) => {
      log.error(`${prefix} process error`, error);
      this.error = error;
      this.exited = true;
      this.settle();
    });
    // Descendants can hold the pipes open long after the process exits,
    // so 'close' only ends the drain early.
    child.on('exit', (code, signal) => {
      log.info(`${prefix} exited (code=${code}, signal=${signal})`);
      this.code = code;
      this.exited = true;
      this.drainTimer = setTimeout(() => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        this.settle();
      }, OUTPUT_DRAIN_MS);
      this.drainTimer.unref();
    });
    child.on('close', () => this.settle());
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exitCode(): number | null {
    return this.code;
  }

  get spawnError(): Error | null {
    return this.error;
  }

  isAlive(): boolean {
    return !this.exited;
  }

  output(): CapturedOutput {
    return { stdout: this.stdout.toString(), stderr: this.stderr.toString() };
  }

  terminate(): void {
    if (!this.exited) this.child.kill('SIGTERM');
  }

  kill(): void {
    if (!this.exited) this.child.kill('SIGKILL');
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.settled) return Promise.resolve(true);
    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters.delete(onExit);
        resolve(false);
      }, timeoutMs);
      this.exitWaiters.add(onExit);
    });
  }

  private settle(): void {
    if (this.settled) return;
    this.settled = true;
    if (this.drainTimer) clearTimeout(this.drainTimer);
    for (const waiter of this.exitWaiters) waiter();
    this.exitWaiters.clear();
  }
}

/**
 * Launches agents with child_process.spawn, stdin closed and both output
 * streams piped for capture.
 */
export class ChildProcessLauncher implements ProcessLauncher {
  launch(spec: LaunchSpec, label: string): ManagedProcess {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: spec.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return new ChildManagedProcess(child, label);
  }
}
