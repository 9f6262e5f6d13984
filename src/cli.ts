import path from 'node:path';
import { defaultChecklistDir, loadChecklist } from './checklist-loader';
import { createNodeFileSystem } from './filesystem';
import { writeJsonSummary, writePrettyReport } from './reporters';
import { runChecklist } from './runner';
import { color, DEFAULT_REPORT_BASE, parseCLI, plain, USAGE } from './utils';

export type MainOptions = {
  cwd?: string;
  checklistDir?: string;
  isTTY?: boolean;
  print?: (line: string) => void;
  printError?: (line: string) => void;
};

const message = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * One full run against `cwd`. The result is the checklist's exit code only:
 * arguments and report output never change it. Throws only when the bundled
 * checklist cannot be loaded.
 */
export async function main(
  argv: string[],
  opts: MainOptions = {}
): Promise<0 | 1> {
  const {
    cwd = process.cwd(),
    checklistDir = defaultChecklistDir(),
    isTTY = !!process.stdout.isTTY,
    print = (line) => console.log(line),
    printError = (line) => console.error(line),
  } = opts;

  const cli = parseCLI(argv);
  if (cli.help) print(USAGE);
  if (cli.ignored.length) {
    for (const w of cli.ignored) printError(`Ignoring ${w}`);
    printError(USAGE);
  }

  const checklist = await loadChecklist(checklistDir);
  const { exitCode, summary } = runChecklist(checklist, {
    fs: createNodeFileSystem(cwd),
    print,
    palette: (cli.color ?? isTTY) ? color : plain,
  });

  if (cli.reportPath) {
    const p = path.resolve(cwd, cli.reportPath);
    try {
      await writeJsonSummary(summary, p);
      print(`📦 Wrote JSON summary to ${p}`);
    } catch (e) {
      printError(`⚠️  Could not write JSON summary to ${p}: ${message(e)}`);
    }
  }
  if (cli.format) {
    const base = path.resolve(cwd, cli.outBase ?? DEFAULT_REPORT_BASE);
    try {
      const written = await writePrettyReport(summary, {
        format: cli.format,
        outBasePath: base,
      });
      for (const p of written) print(`📝 Wrote report to ${p}`);
    } catch (e) {
      printError(`⚠️  Could not write report to ${base}: ${message(e)}`);
    }
  }

  return exitCode;
}
