import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { main } from '../cli';
import { migratedProject } from './fixtures';

describe('main', () => {
  let root: string;
  let out: string[];
  let err: string[];

  const run = (argv: string[]) =>
    main(argv, {
      cwd: root,
      isTTY: false,
      print: (line) => out.push(line),
      printError: (line) => err.push(line),
    });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'migration-cli-'));
    for (const [rel, content] of Object.entries(migratedProject())) {
      fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
      fs.writeFileSync(path.join(root, rel), content);
    }
    out = [];
    err = [];
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('exits 0 for a migrated project with no arguments', async () => {
    expect(await run([])).toBe(0);
    expect(out).toContain("3. Run 'cargo run --example libp2p_network_demo' to see the demo");
    expect(err).toEqual([]);
  });

  it('exits 1 when a check fails', async () => {
    fs.rmSync(path.join(root, 'NETWORK_MIGRATION.md'));
    expect(await run([])).toBe(1);
    expect(out).toContain('❌ Test/example file: NETWORK_MIGRATION.md (not found)');
  });

  it('ignores positional arguments and unknown flags but still runs every check', async () => {
    expect(await run(['.', '--model', 'x'])).toBe(0);
    expect(err.slice(0, 3)).toEqual([
      'Ignoring unexpected argument: .',
      'Ignoring unknown flag: --model',
      'Ignoring unexpected argument: x',
    ]);
    expect(out).toContain('7. Checking tests and examples');
  });

  it('prints usage for --help and still runs the checks', async () => {
    fs.rmSync(path.join(root, 'Cargo.toml'));
    expect(await run(['--help'])).toBe(1);
    expect(out[0]?.startsWith('Usage: migration-checklist')).toBe(true);
    expect(out).toContain(
      '❌ Run this tool from the project root (Cargo.toml not found)'
    );
  });

  it('keeps the exit code when a report cannot be written', async () => {
    fs.writeFileSync(path.join(root, 'blocker'), '');
    const target = path.join(root, 'blocker', 'summary.json');
    expect(await run(['--report', target, '--format', 'md', '--out', 'blocker/report'])).toBe(0);
    expect(err).toHaveLength(2);
    expect(err[0]?.startsWith(`⚠️  Could not write JSON summary to ${target}: `)).toBe(true);
    expect(
      err[1]?.startsWith(
        `⚠️  Could not write report to ${path.join(root, 'blocker', 'report')}: `
      )
    ).toBe(true);
  });

  it('writes requested reports relative to the project', async () => {
    expect(await run(['--report', 'out/summary.json', '--out', 'out/report'])).toBe(0);
    const summary: unknown = JSON.parse(
      fs.readFileSync(path.join(root, 'out', 'summary.json'), 'utf8')
    );
    expect(summary).toMatchObject({ passed: true, checked: 11 });
    expect(fs.existsSync(path.join(root, 'out', 'report.md'))).toBe(true);
    expect(out).toContain(`📝 Wrote report to ${path.join(root, 'out', 'report.md')}`);
  });
});
