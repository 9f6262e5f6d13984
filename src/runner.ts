import { runCheck } from './checks';
import type { FileSystem } from './filesystem';
import type {
  CheckResult,
  Checklist,
  RunSummary,
  SectionResult,
} from './types';
import { plain, rule, type Palette } from './utils';

export type RunOptions = {
  fs: FileSystem;
  print?: (line: string) => void;
  palette?: Palette;
};

export type RunOutcome = {
  exitCode: 0 | 1;
  summary: RunSummary;
};

function printBanner(
  checklist: Checklist,
  passed: boolean,
  print: (line: string) => void,
  c: Palette
) {
  print('\n' + rule());
  if (!passed) {
    print(c.yellow(`⚠️  ${checklist.failureMessage}`));
    return;
  }
  print(c.green(c.bold(`🎉 ${checklist.successMessage}`)));
  print('\nMigration summary:');
  for (const line of checklist.confirmations) {
    print(c.green(`✅ ${line}`));
  }
  print('\nNext steps:');
  checklist.nextSteps.forEach((step, i) => print(`${i + 1}. ${step}`));
}

/**
 * Run every section in order. Checks never short-circuit: a failure only
 * flips the aggregate, the remaining checks still run and print.
 */
export function runChecklist(
  checklist: Checklist,
  opts: RunOptions
): RunOutcome {
  const { fs, print = (line) => console.log(line), palette: c = plain } = opts;

  print(c.bold(checklist.title));
  print(rule());

  if (!fs.exists(checklist.marker)) {
    print(c.red(`❌ ${checklist.markerMissingMessage}`));
    return {
      exitCode: 1,
      summary: {
        title: checklist.title,
        preconditionMet: false,
        passed: false,
        checked: 0,
        succeeded: 0,
        failed: 0,
        sections: [],
      },
    };
  }

  let allPassed = true;
  const sections: SectionResult[] = [];

  for (const section of checklist.sections) {
    print('');
    print(c.bold(`${section.order}. ${section.title}`));
    const checks: CheckResult[] = [];
    for (const check of section.checks) {
      const res = runCheck(fs, check);
      for (const line of res.lines) print(line);
      checks.push(res);
    }
    const pass = checks.every((r) => r.pass);
    allPassed = allPassed && pass;
    sections.push({ order: section.order, title: section.title, pass, checks });
  }

  printBanner(checklist, allPassed, print, c);

  const results = sections.flatMap((s) => s.checks);
  const succeeded = results.filter((r) => r.pass).length;
  return {
    exitCode: allPassed ? 0 : 1,
    summary: {
      title: checklist.title,
      preconditionMet: true,
      passed: allPassed,
      checked: results.length,
      succeeded,
      failed: results.length - succeeded,
      sections,
    },
  };
}
