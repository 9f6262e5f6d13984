import type {
  Check,
  CheckResult,
  ContentCheck,
  ExistenceCheck,
  Requirement,
  RequirementResult,
} from './types';
import type { FileSystem } from './filesystem';

export function checkFileExists(
  fs: FileSystem,
  check: ExistenceCheck
): CheckResult {
  const { path, description } = check;
  if (fs.exists(path)) {
    return {
      check,
      pass: true,
      status: 'passed',
      requirements: [],
      lines: [`✅ ${description}: ${path}`],
    };
  }
  return {
    check,
    pass: false,
    status: 'missing',
    requirements: [],
    lines: [`❌ ${description}: ${path} (not found)`],
  };
}

function matchRequirements(
  content: string,
  requirements: Requirement[]
): RequirementResult[] {
  return requirements.map(({ pattern, description }) => ({
    description,
    pattern: pattern.source,
    pass: pattern.test(content),
  }));
}

/**
 * A missing file fails the whole check with a single line, whatever the
 * requirements. Read errors are reported the same way and never thrown.
 */
export function checkFileContent(
  fs: FileSystem,
  check: ContentCheck
): CheckResult {
  const { path, description, requirements } = check;
  if (!fs.exists(path)) {
    return {
      check,
      pass: false,
      status: 'missing',
      requirements: [],
      lines: [`❌ ${description}: ${path} (file not found)`],
    };
  }

  let content: string;
  try {
    content = fs.readText(path);
  } catch (e) {
    const error = e instanceof Error ? e.message : String(e);
    return {
      check,
      pass: false,
      status: 'unreadable',
      requirements: [],
      error,
      lines: [`❌ ${description}: failed to read file - ${error}`],
    };
  }

  const results = matchRequirements(content, requirements);
  const pass = results.every((r) => r.pass);
  return {
    check,
    pass,
    status: pass ? 'passed' : 'failed',
    requirements: results,
    lines: [
      `📄 ${description}: ${path}`,
      ...results.map((r) => `  ${r.pass ? '✅' : '❌'} ${r.description}`),
    ],
  };
}

export function runCheck(fs: FileSystem, check: Check): CheckResult {
  switch (check.kind) {
    case 'exists':
      return checkFileExists(fs, check);
    case 'content':
      return checkFileContent(fs, check);
  }
}
