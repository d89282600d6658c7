import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { DeploymentError } from '../utils/errors.js';
import { venvPython, type AgentRuntime } from './runtime.js';

const log = logger.child('environment');

const SIGKILL_GRACE_MS = 5_000;

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Run a command to completion with captured output.
 * On timeout: SIGTERM, then SIGKILL after a grace period.
 */
export function runCommand(command: string, args: string[], cwd: string, timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let settled = false;

    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), SIGKILL_GRACE_MS);
    }, timeoutMs);

    const finish = (code: number | null, extraError?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      const stderr = Buffer.concat(stderrChunks).toString('utf8');
      resolve({
        code,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: extraError ? `${stderr}${extraError}\n` : stderr,
        timedOut,
      });
    };

    child.on('error', (error) => finish(null, error.message));
    child.on('close', (code) => finish(code));
  });
}

/**
 * Prepares an extracted agent package so it can run: an isolated
 * interpreter environment plus its declared dependencies.
 */
export interface EnvironmentBuilder {
  /** @throws DeploymentError (500) when the environment cannot be built */
  prepare(agentDir: string, runtime: AgentRuntime): Promise<void>;
}

export interface SubprocessEnvironmentOptions {
  pythonCommand: string;
  npmCommand?: string;
  timeoutMs?: number;
}

/**
 * Python agents get `.venv` and `pip install -r requirements.txt`;
 * Node.js agents get `npm install` when they ship a package.json.
 */
export class SubprocessEnvironmentBuilder implements EnvironmentBuilder {
  private readonly pythonCommand: string;
  private readonly npmCommand: string;
  private readonly timeoutMs: number;

  constructor(options: SubprocessEnvironmentOptions) {
    this.pythonCommand = options.pythonCommand;
    this.npmCommand = options.npmCommand ?? (process.platform === 'win32' ? 'npm.cmd' : 'npm');
    this.timeoutMs = options.timeoutMs ?? 10 * 60_000;
  }

  async prepare(agentDir: string, runtime: AgentRuntime): Promise<void> {
    if (runtime === 'node') {
      await this.prepareNode(agentDir);
    } else {
      await this.preparePython(agentDir);
    }
  }

  private async preparePython(agentDir: string): Promise<void> {
    log.info('Creating virtual environment', { path: join(agentDir, '.venv') });
    const venv = await runCommand(this.pythonCommand, ['-m', 'venv', '.venv'], agentDir, this.timeoutMs);
    this.assertSucceeded(venv, 'Failed to create virtual environment');

    if (!existsSync(join(agentDir, 'requirements.txt'))) return;
    log.info('Installing Python dependencies from requirements.txt');
    const pip = await runCommand(
      venvPython(agentDir),
      ['-m', 'pip', 'install', '-r', 'requirements.txt'],
      agentDir,
      this.timeoutMs
    );
    this.assertSucceeded(pip, 'Failed to install dependencies');
    log.info(pip.stdout.includes('Successfully installed') ? 'Dependencies installed' : 'All dependencies already satisfied');
  }

  private async prepareNode(agentDir: string): Promise<void> {
    if (!existsSync(join(agentDir, 'package.json'))) return;
    log.info('Installing Node.js dependencies');
    const npm = await runCommand(this.npmCommand, ['install', '--omit=dev'], agentDir, this.timeoutMs);
    this.assertSucceeded(npm, 'Failed to install dependencies');
  }

  private assertSucceeded(result: CommandResult, message: string): void {
    if (result.code === 0 && !result.timedOut) return;
    const reason = result.timedOut ? 'timed out' : `exit code ${result.code ?? 'null'}`;
    log.error(`${message} (${reason})`, { stderr: result.stderr.slice(-2000) });
    throw new DeploymentError(`${message}: ${result.stderr.trim().split('\n').slice(-5).join('\n') || reason}`, 500);
  }
}
