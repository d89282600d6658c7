import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { exceedsCeiling, generateDiagnostics } from '../../src/deployment/diagnostics.js';
import { makeTempDir, writeAgent } from '../helpers/agents.js';

describe('exceedsCeiling', () => {
  it('flags Python newer than 3.13', () => {
    expect(exceedsCeiling('python', '3.13.2')).toBe(false);
    expect(exceedsCeiling('python', '3.14.0')).toBe(true);
    expect(exceedsCeiling('python', '4.0')).toBe(true);
  });

  it('flags Node.js newer than 22', () => {
    expect(exceedsCeiling('node', '22.11.0')).toBe(false);
    expect(exceedsCeiling('node', '23.1.0')).toBe(true);
  });

  it('ignores unparseable versions', () => {
    expect(exceedsCeiling('python', 'unknown')).toBe(false);
  });
});

describe('generateDiagnostics', () => {
  let root: string;
  let configPath: string;
  let agentDir: string;

  beforeEach(() => {
    root = makeTempDir('diag');
    configPath = writeAgent(root, 'researcher', 'researcher', '\n[dependencies]\npython = ">=3.10"\npackages = ["langchain", "httpx"]\n');
    agentDir = dirname(configPath);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('points at the requirements install for a missing module', () => {
    const report = generateDiagnostics({
      agentName: 'researcher',
      status: 'failed',
      configPath,
      exitCode: 1,
      port: 8100,
      errorMessage: 'Process exited with code 1 during startup',
      stderr: "Traceback (most recent call last):\nModuleNotFoundError: No module named 'langchain'\n",
      runtimeVersion: '3.12.4',
      runtimeCommand: 'python3',
    });

    expect(report).toContain('AGENT STARTUP DIAGNOSTICS: researcher');
    expect(report).toContain('  Missing Python dependencies: langchain');
    expect(report).toContain(`    Fix: cd "${agentDir}" && python3 -m pip install -r requirements.txt`);
    expect(report).toContain('install -r requirements.txt');
  });

  it('summarizes the header, environment and configuration', () => {
    const lines = generateDiagnostics({
      agentName: 'researcher',
      status: 'failed',
      configPath,
      exitCode: 2,
      port: 8101,
      errorMessage: 'boom',
      runtimeVersion: '3.12.4',
      runtimeCommand: 'python3',
      supervisorVersion: 'v20.11.0',
    }).split('\n');

    expect(lines[0]).toBe('='.repeat(60));
    expect(lines).toContain('Status: failed');
    expect(lines).toContain('Exit code: 2');
    expect(lines).toContain('Port: 8101');
    expect(lines).toContain('Error: boom');
    expect(lines).toContain('  Python version: 3.12.4 (python3)');
    expect(lines).toContain(`  Config file: ${configPath} (exists)`);
    expect(lines).toContain('  Agent: researcher v1.2.0');
    expect(lines).toContain('  Entry point: main.py');
    expect(lines).toContain('  Dependencies: 2 packages required');
    expect(lines).toContain('    - langchain');
    expect(lines).toContain('  Required Python: >=3.10');
    expect(lines).toContain('  main.py: missing');
    expect(lines).toContain('  .venv: missing');
  });

  it('reports files present in the agent directory', () => {
    writeFileSync(join(agentDir, 'main.py'), 'print("hi")\n');
    writeFileSync(join(agentDir, 'requirements.txt'), 'httpx\n');
    mkdirSync(join(agentDir, '.venv'));

    const lines = generateDiagnostics({ agentName: 'researcher', status: 'failed', configPath }).split('\n');

    expect(lines).toContain('  main.py: present');
    expect(lines).toContain('  requirements.txt: present');
    expect(lines).toContain('  .venv: present');
  });

  it('warns about Python 3.14', () => {
    const report = generateDiagnostics({
      agentName: 'researcher',
      status: 'failed',
      configPath,
      runtimeVersion: '3.14.0',
      runtimeCommand: 'python3',
    });

    expect(report).toContain('WARNING: Python 3.14+ detected');
    expect(report).toContain('Use Python 3.11 or 3.13 for agent environments.');
  });

  it('recognizes a port conflict', () => {
    const report = generateDiagnostics({
      agentName: 'researcher',
      status: 'failed',
      configPath,
      port: 8105,
      stderr: 'OSError: [Errno 98] error while attempting to bind: address already in use',
    });

    expect(report).toContain('  Port 8105 already in use');
    expect(report).toContain('    Fix: Stop other services using port 8105');
  });

  it('says so when no pattern matches and output is empty', () => {
    const lines = generateDiagnostics({ agentName: 'researcher', status: 'failed', configPath }).split('\n');

    expect(lines).toContain('  No known failure pattern found in the captured output');
    const stderrAt = lines.indexOf('STDERR (last 20 lines):');
    expect(lines[stderrAt + 1]).toBe('  (empty)');
  });

  it('keeps only the last 20 lines of output', () => {
    const stdout = Array.from({ length: 30 }, (_, i) => `line ${i + 1}`).join('\n');
    const lines = generateDiagnostics({ agentName: 'researcher', status: 'failed', configPath, stdout }).split('\n');

    const start = lines.indexOf('STDOUT (last 20 lines):');
    expect(lines[start + 1]).toBe('  line 11');
    expect(lines[start + 20]).toBe('  line 30');
    expect(lines).not.toContain('  line 10');
  });

  it('handles a missing definition file', () => {
    const report = generateDiagnostics({
      agentName: 'ghost',
      status: 'failed',
      configPath: join(root, 'ghost', 'agent.toml'),
    });

    expect(report).toContain(`  Config file: ${join(root, 'ghost', 'agent.toml')} (NOT FOUND)`);
    expect(report).toContain('TROUBLESHOOTING STEPS:');
    expect(report).toContain('  5. Restart with LOG_LEVEL=debug to stream agent output into the supervisor log');
  });
});
