export type ReportFormat = 'md' | 'html' | 'all';

export type CLIOpts = {
  help: boolean;
  color?: boolean; // undefined: decide from the terminal
  reportPath?: string | null; // JSON summary
  format?: ReportFormat | null; // pretty report, off when null
  outBase?: string | null;
  ignored: string[]; // warnings for arguments that were not understood
};

export type Requirement = {
  pattern: RegExp;
  description: string;
};

export type ExistenceCheck = {
  kind: 'exists';
  path: string;
  description: string;
};

export type ContentCheck = {
  kind: 'content';
  path: string;
  description: string;
  requirements: Requirement[];
};

export type Check = ExistenceCheck | ContentCheck;

export type Section = {
  order: number;
  title: string;
  checks: Check[];
  filePath: string; // definition file (for debugging)
};

export type Checklist = {
  id: string;
  title: string;
  marker: string; // must exist in the working directory before anything runs
  markerMissingMessage: string;
  successMessage: string;
  confirmations: string[];
  nextSteps: string[];
  failureMessage: string;
  sections: Section[];
};

export type CheckStatus = 'passed' | 'failed' | 'missing' | 'unreadable';

export type RequirementResult = {
  description: string;
  pattern: string;
  pass: boolean;
};

export type CheckResult = {
  check: Check;
  pass: boolean;
  status: CheckStatus;
  requirements: RequirementResult[];
  error?: string;
  lines: string[];
};

export type SectionResult = {
  order: number;
  title: string;
  pass: boolean;
  checks: CheckResult[];
};

export type RunSummary = {
  title: string;
  preconditionMet: boolean;
  passed: boolean;
  checked: number;
  succeeded: number;
  failed: number;
  sections: SectionResult[];
};

export type PrettyReportOptions = {
  format?: ReportFormat;
  // file basename, extension will be added per format
  outBasePath?: string;
};
