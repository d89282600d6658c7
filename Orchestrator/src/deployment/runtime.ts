import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { promisify } from 'node:util';
import type { AgentDefinition } from '../config/agent-definition.js';
import type { LaunchSpec } from './process-launcher.js';

const execFileAsync = promisify(execFile);

export type AgentRuntime = 'python' | 'node';

const NODE_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);

/** Runtime implied by the entry point's extension; anything unknown runs under Python. */
export function detectRuntime(entryPoint: string): AgentRuntime {
  return NODE_EXTENSIONS.has(extname(entryPoint).toLowerCase()) ? 'node' : 'python';
}

/** Interpreter inside the agent's own virtualenv, if it has one */
export function venvPython(agentDir: string): string {
  return process.platform === 'win32'
    ? join(agentDir, '.venv', 'Scripts', 'python.exe')
    : join(agentDir, '.venv', 'bin', 'python');
}

export interface AgentLaunch extends LaunchSpec {
  runtime: AgentRuntime;
  entryPath: string;
}

export interface ResolveLaunchOptions {
  pythonCommand: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the command line for an agent:
 * `<interpreter> <entry> --port <port> --agent <definition>`, run from the
 * definition's directory.
 */
export function resolveLaunch(
  name: string,
  configPath: string,
  definition: AgentDefinition,
  port: number,
  options: ResolveLaunchOptions
): AgentLaunch {
  const agentDir = dirname(resolve(configPath));
  const entryPath = join(agentDir, definition.agent.entry_point);
  const runtime = detectRuntime(entryPath);

  let command: string;
  if (runtime === 'node') {
    command = process.execPath;
  } else {
    const venv = venvPython(agentDir);
    command = existsSync(venv) ? venv : options.pythonCommand;
  }

  return {
    runtime,
    entryPath,
    command,
    args: [entryPath, '--port', String(port), '--agent', resolve(configPath)],
    cwd: agentDir,
    env: {
      ...(options.env ?? process.env),
      PYTHONUNBUFFERED: '1',
      FLOTILLA_AGENT_NAME: name,
      FLOTILLA_AGENT_PORT: String(port),
    },
  };
}

/**
 * Ask an interpreter for its version (`--version`), e.g. "3.12.4".
 * Returns null when the interpreter cannot be run.
 */
export async function detectRuntimeVersion(command: string): Promise<string | null> {
  try {
    const { stdout, stderr } = await execFileAsync(command, ['--version'], { timeout: 5000 });
    const match = /(\d+\.\d+(?:\.\d+)?)/.exec(`${stdout} ${stderr}`);
    return match ? match[1] : null;
  } catch {
    return null;
  }
}
