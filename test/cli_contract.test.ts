import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { runCli } from '../src/cli.js';

describe('cli contract', () => {
  let dir: string;
  let stdout: MockInstance<typeof process.stdout.write>;
  let stderr: MockInstance<typeof process.stderr.write>;

  const text = (spy: { mock: { calls: ReadonlyArray<ReadonlyArray<unknown>> } }): string =>
    spy.mock.calls.map((c) => String(c[0])).join('');

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vmt-cli-'));
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function source(name: string, body: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, body, 'utf8');
    return path;
  }

  it('writes <stem>.asm beside a single input file', async () => {
    const input = await source('Prog.vm', 'push constant 2\npush constant 3\nadd\n');

    expect(await runCli([input])).toBe(0);
    const out = join(dir, 'Prog.asm');
    expect(text(stdout)).toBe(`${out}\n`);
    expect(text(stderr)).toBe('');
    const asm = await readFile(out, 'utf8');
    expect(asm.startsWith('// push constant 2\n@2\nD=A\n')).toBe(true);
    expect(asm).not.toContain('@256');
  });

  it('writes <dir>/<dirname>.asm for a directory, with bootstrap', async () => {
    const project = join(dir, 'Game');
    await mkdir(project);
    await writeFile(
      join(project, 'Sys.vm'),
      'function Sys.init 0\nlabel END\ngoto END\n',
      'utf8',
    );

    expect(await runCli([project])).toBe(0);
    const out = join(project, 'Game.asm');
    expect(text(stdout)).toBe(`${out}\n`);
    const asm = await readFile(out, 'utf8');
    expect(asm.startsWith('// bootstrap\n@256\nD=A\n@SP\nM=D\n')).toBe(true);
    expect(asm).toContain('(Sys.init$END)\n');
  });

  it('exits 1 and writes nothing when translation fails', async () => {
    const input = await source('Bad.vm', 'push constant 1\nbogus\n');

    expect(await runCli([input])).toBe(1);
    expect(text(stderr)).toBe(`${input}:2:1: error: [VMT102] Unknown command "bogus"\n`);
    expect(text(stdout)).toBe('');
    expect(existsSync(join(dir, 'Bad.asm'))).toBe(false);
  });

  it('prints linkage warnings and still succeeds', async () => {
    const input = await source('Warn.vm', 'function Warn.f 0\ncall Warn.g 0\nreturn\n');

    expect(await runCli(['--linkage', 'warn', input])).toBe(0);
    expect(text(stderr)).toBe(
      `${input}:2:1: warning: [VMT301] Linkage: call to undeclared function "Warn.g"\n`,
    );
    expect(existsSync(join(dir, 'Warn.asm'))).toBe(true);
  });

  it('honours -o, --listing and --no-comments', async () => {
    const input = await source('Prog.vm', 'push constant 9\n');
    const out = join(dir, 'build', 'out.asm');

    expect(await runCli(['-o', out, '--listing', '--no-comments', '--no-halt', input])).toBe(0);
    expect(text(stdout)).toBe(`${out}\n`);
    expect(await readFile(out, 'utf8')).toBe('@9\nD=A\n@SP\nA=M\nM=D\n@SP\nM=M+1\n');
    const listing = await readFile(join(dir, 'build', 'out.lst'), 'utf8');
    expect(listing.split('\n').slice(0, 2)).toEqual(['// vmt listing', '// 7 instructions']);
  });

  it('rejects usage errors with exit code 2', async () => {
    const input = await source('Prog.vm', 'push constant 1\n');

    expect(await runCli(['--frobnicate', input])).toBe(2);
    expect(text(stderr).split('\n')[0]).toBe('vmt: Unknown option "--frobnicate"');

    stderr.mockClear();
    expect(await runCli(['-o', join(dir, 'out.txt'), input])).toBe(2);
    expect(text(stderr).split('\n')[0]).toBe('vmt: --output must end with ".asm"');

    stderr.mockClear();
    expect(await runCli([input, '--listing'])).toBe(2);
    expect(text(stderr).split('\n')[0]).toBe(
      'vmt: Expected exactly one <input> argument (and it must be last)',
    );

    stderr.mockClear();
    expect(await runCli(['--linkage', 'loud', input])).toBe(2);
    expect(text(stderr).split('\n')[0]).toBe(
      'vmt: Unsupported --linkage "loud" (expected off|warn|error)',
    );
  });

  it('prints the package version and help', async () => {
    expect(await runCli(['--version'])).toBe(0);
    expect(text(stdout)).toBe('0.1.0\n');

    stdout.mockClear();
    expect(await runCli(['--help'])).toBe(0);
    expect(text(stdout).split('\n')[0]).toBe('vmt [options] <input.vm | directory>');
  });
});
