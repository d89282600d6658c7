import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { loadAgentDefinition, type AgentDefinition } from '../config/agent-definition.js';
import { detectRuntime, venvPython, type AgentRuntime } from './runtime.js';

const RULE = '='.repeat(60);
const TAIL_LINES = 20;

/** Newest interpreter versions agents are known to work on */
export const TESTED_RUNTIME_CEILING: Record<AgentRuntime, [number, number]> = {
  python: [3, 13],
  node: [22, 99],
};

export interface DiagnosticsInput {
  agentName: string;
  status: string;
  configPath: string;
  exitCode?: number | null;
  port?: number;
  errorMessage?: string;
  stdout?: string;
  stderr?: string;
  /** Agent interpreter version as reported by `--version` */
  runtimeVersion?: string | null;
  /** Interpreter that was (or would be) used to launch the agent */
  runtimeCommand?: string;
  /** Supervisor's Node.js version; defaults to process.version */
  supervisorVersion?: string;
}

interface IssueContext {
  runtime: AgentRuntime;
  agentDir: string;
  interpreter: string;
  port?: number;
  stderr: string;
}

interface IssuePattern {
  pattern: RegExp;
  describe(ctx: IssueContext): string[];
}

function installCommand(ctx: Pick<IssueContext, 'runtime' | 'interpreter'>): string {
  return ctx.runtime === 'node' ? 'npm install' : `${ctx.interpreter} -m pip install -r requirements.txt`;
}

const ISSUE_PATTERNS: IssuePattern[] = [
  {
    pattern: /ModuleNotFoundError|ImportError|No module named|Cannot find module|ERR_MODULE_NOT_FOUND/,
    describe: (ctx) => {
      const missing =
        /No module named '([^']+)'/.exec(ctx.stderr)?.[1] ?? /Cannot find (?:module|package) '([^']+)'/.exec(ctx.stderr)?.[1];
      const label = ctx.runtime === 'node' ? 'Missing Node.js dependencies' : 'Missing Python dependencies';
      return [
        missing ? `${label}: ${missing}` : label,
        `  Fix: cd "${ctx.agentDir}" && ${installCommand(ctx)}`,
      ];
    },
  },
  {
    pattern: /Pydantic V1|isn't compatible with Python 3\.1[4-9]/,
    describe: () => [
      "Pydantic V1 compatibility: langchain-core's Pydantic V1 layer does not run on Python 3.14+",
      '  Fix: Use Python 3.11 or 3.13 for this agent (recreate its .venv or set pythonCommand)',
    ],
  },
  {
    pattern: /address already in use|EADDRINUSE|Only one usage of each socket address/i,
    describe: (ctx) => {
      const port = ctx.port !== undefined ? String(ctx.port) : '(unknown)';
      return [
        `Port ${port} already in use`,
        `  Fix: Stop other services using port ${port}, or change base_port in the deployment configuration`,
      ];
    },
  },
  {
    pattern: /Permission denied|EACCES|PermissionError/,
    describe: (ctx) => [
      'Permission denied while starting the agent',
      `  Fix: Check that the entry point and "${ctx.agentDir}" are readable and executable by this user`,
    ],
  },
  {
    pattern: /Connection refused|ECONNREFUSED/i,
    describe: () => [
      'A service the agent depends on refused the connection',
      '  Fix: Start the companion service (LLM backend, MCP server) before starting the agent',
    ],
  },
];

function parseVersion(version: string): [number, number] | null {
  const match = /(\d+)\.(\d+)/.exec(version);
  return match ? [Number(match[1]), Number(match[2])] : null;
}

/** True when `version` is newer than the tested ceiling for the runtime */
export function exceedsCeiling(runtime: AgentRuntime, version: string): boolean {
  const parsed = parseVersion(version);
  if (!parsed) return false;
  const [major, minor] = parsed;
  const [maxMajor, maxMinor] = TESTED_RUNTIME_CEILING[runtime];
  return major > maxMajor || (major === maxMajor && minor > maxMinor);
}

function tail(text: string | undefined, lines: number): string[] {
  if (!text || text.trim() === '') return ['  (empty)'];
  const all = text.replace(/\s+$/, '').split(/\r?\n/);
  return all.slice(-lines).map((line) => `  ${line}`);
}

function tryLoadDefinition(configPath: string): AgentDefinition | null {
  try {
    return loadAgentDefinition(configPath);
  } catch {
    return null;
  }
}

/**
 * Build a human-readable startup report for a failed agent: environment,
 * configuration, agent directory contents, recognized failure causes with
 * their fix, the tail of the captured output and a troubleshooting checklist.
 */
export function generateDiagnostics(input: DiagnosticsInput): string {
  const configPath = resolve(input.configPath);
  const agentDir = dirname(configPath);
  const configExists = existsSync(configPath);
  const definition = configExists ? tryLoadDefinition(configPath) : null;
  const entryPoint = definition?.agent.entry_point ?? 'main.py';
  const runtime = detectRuntime(entryPoint);
  const interpreter =
    input.runtimeCommand ?? (runtime === 'node' ? process.execPath : existsSync(venvPython(agentDir)) ? venvPython(agentDir) : 'python3');
  const stderr = input.stderr ?? '';

  const out: string[] = [
    RULE,
    `AGENT STARTUP DIAGNOSTICS: ${input.agentName}`,
    RULE,
    `Status: ${input.status}`,
    `Exit code: ${input.exitCode ?? 'n/a'}`,
    `Port: ${input.port ?? 'not allocated'}`,
  ];
  if (input.errorMessage) out.push(`Error: ${input.errorMessage}`);

  // Environment
  out.push('', 'ENVIRONMENT:');
  out.push(`  Supervisor: Node.js ${input.supervisorVersion ?? process.version} (${process.platform} ${process.arch})`);
  const runtimeLabel = runtime === 'node' ? 'Node.js version' : 'Python version';
  out.push(`  ${runtimeLabel}: ${input.runtimeVersion ?? 'unknown'} (${interpreter})`);
  if (input.runtimeVersion && exceedsCeiling(runtime, input.runtimeVersion)) {
    if (runtime === 'python') {
      out.push('  WARNING: Python 3.14+ detected. Some agent libraries (langchain-core Pydantic V1) do not support it.');
      out.push('  Use Python 3.11 or 3.13 for agent environments.');
    } else {
      out.push('  WARNING: Node.js 23+ detected. Agents are tested up to Node.js 22.');
    }
  }

  // Configuration
  out.push('', 'CONFIGURATION:');
  out.push(`  Config file: ${configPath} (${configExists ? 'exists' : 'NOT FOUND'})`);
  if (configExists && !definition) {
    out.push('  Config could not be parsed');
  }
  if (definition) {
    out.push(`  Agent: ${definition.agent.name} v${definition.agent.version}`);
    out.push(`  Entry point: ${entryPoint}`);
    const deps = definition.dependencies;
    if (deps) {
      if (deps.packages.length > 0) {
        out.push(`  Dependencies: ${deps.packages.length} packages required`);
        for (const pkg of deps.packages) out.push(`    - ${pkg}`);
      }
      const constraint = runtime === 'node' ? deps.node : deps.python;
      if (constraint) out.push(`  Required ${runtime === 'node' ? 'Node.js' : 'Python'}: ${constraint}`);
    }
  }

  // Agent directory
  const manifest = runtime === 'node' ? 'package.json' : 'requirements.txt';
  const isolatedEnv = runtime === 'node' ? 'node_modules' : '.venv';
  out.push('', 'AGENT DIRECTORY:');
  out.push(`  Path: ${agentDir}`);
  for (const file of [entryPoint, manifest, isolatedEnv]) {
    out.push(`  ${file}: ${existsSync(join(agentDir, file)) ? 'present' : 'missing'}`);
  }

  // Recognized failure causes
  const ctx: IssueContext = { runtime, agentDir, interpreter, port: input.port, stderr };
  const issues = ISSUE_PATTERNS.filter((issue) => issue.pattern.test(stderr)).flatMap((issue) => issue.describe(ctx));
  out.push('', 'DETECTED ISSUES:');
  if (issues.length === 0) {
    out.push('  No known failure pattern found in the captured output');
  } else {
    out.push(...issues.map((line) => `  ${line}`));
  }

  out.push('', `STDERR (last ${TAIL_LINES} lines):`, ...tail(input.stderr, TAIL_LINES));
  out.push('', `STDOUT (last ${TAIL_LINES} lines):`, ...tail(input.stdout, TAIL_LINES));

  const port = input.port !== undefined ? String(input.port) : '<port>';
  out.push(
    '',
    'TROUBLESHOOTING STEPS:',
    '  1. Check the STDERR and STDOUT logs above for the first error',
    `  2. Verify all dependencies are installed: cd "${agentDir}" && ${installCommand(ctx)}`,
    `  3. Test the agent configuration by running it by hand: cd "${agentDir}" && ${interpreter} ${entryPoint} --port ${port} --agent ${configPath}`,
    `  4. Make sure nothing else is listening on port ${port}`,
    '  5. Restart with LOG_LEVEL=debug to stream agent output into the supervisor log',
    RULE
  );

  return out.join('\n');
}
