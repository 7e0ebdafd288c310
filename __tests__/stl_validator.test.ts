import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';

import type { CliIo } from '../stl_validator';
import { run } from '../stl_validator';
import { CCW, trianglesToAscii } from './fixtures';

describe('stl-validator cli', () => {
  let dir = '';
  let good = '';
  let renamed = '';
  let stdout: string[] = [];
  let stderr: string[] = [];
  const io: CliIo = {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'stl-validator-cli-'));
    good = path.join(dir, 'good.stl');
    renamed = path.join(dir, 'renamed.stl');
    await writeFile(good, trianglesToAscii([CCW], 'good'));
    await writeFile(renamed, trianglesToAscii([CCW], 'cube', 'box'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    stdout = [];
    stderr = [];
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('prints the pass report to stdout and exits 0', async () => {
    expect(await run([good], io)).toBe(0);
    expect(stderr).toEqual([]);
    expect(stdout.map((line) => JSON.parse(line))).toEqual([
      {
        eventOutcomeInformation: 'pass',
        eventOutcomeDetailNote:
          'format="STL (Standard Tessellation Language)"; version="ASCII"; result="errors: 0; warnings: 0"',
        stdout: `${good} validates.`,
      },
    ]);
  });

  it('prints the fail report to stderr and exits 1', async () => {
    expect(await run([renamed], io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.map((line) => JSON.parse(line))).toEqual([
      {
        eventOutcomeInformation: 'fail',
        eventOutcomeDetailNote: "line 9: Expected 'endsolid cube' but got 'endsolid box'.",
        stdout: null,
      },
    ]);
  });

  it('downgrades soft violations with --tolerant', async () => {
    expect(await run(['--tolerant', renamed], io)).toBe(0);
    expect(JSON.parse(stdout[0] ?? '{}').eventOutcomeDetailNote).toBe(
      'format="STL (Standard Tessellation Language)"; version="ASCII"; result="errors: 0; warnings: 1"'
    );
  });

  it('prints warnings before the report with -v', async () => {
    expect(await run(['-v', '-t', renamed], io)).toBe(0);
    expect(stdout).toHaveLength(2);
    expect(stdout[0]).toBe("Warning on line 9: Expected 'endsolid cube' but got 'endsolid box'.");
  });

  it('reports unreadable files as failures', async () => {
    expect(await run([path.join(dir, 'missing.stl')], io)).toBe(1);
    const report = JSON.parse(stderr[0] ?? '{}');
    expect(report.eventOutcomeInformation).toBe('fail');
    expect(report.eventOutcomeDetailNote).toMatch(/^ENOENT/);
  });

  it('prints usage and exits 0 without a file', async () => {
    expect(await run([], io)).toBe(0);
    expect(stdout).toHaveLength(1);
    expect(stdout[0]).toContain('Usage: stl-validator <file> [options]');
  });

  it('prints help through the given output with --help', async () => {
    const consoleLog = vi.spyOn(console, 'log');
    expect(await run(['--help'], io)).toBe(0);
    expect(await run(['-h', good], io)).toBe(0);
    expect(consoleLog).not.toHaveBeenCalled();
    expect(stderr).toEqual([]);
    expect(stdout).toHaveLength(2);
    expect(stdout[0]).toContain('Usage: stl-validator <file> [options]');
    expect(stdout[0]).toContain('--tolerant');
  });

  it('reads flags from STL_VALIDATOR_ environment variables', async () => {
    vi.stubEnv('STL_VALIDATOR_TOLERANT', 'true');
    expect(await run([renamed], io)).toBe(0);
    expect(JSON.parse(stdout[0] ?? '{}').eventOutcomeInformation).toBe('pass');
  });

  it('rejects unknown options', async () => {
    expect(await run(['--strict', good], io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr[0]).toContain('Unknown argument');
  });
});
