import type { CLIOpts, ReportFormat } from './types';

// ---------- Pretty logging ----------
export const color = {
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

export type Palette = typeof color;

const identity = (s: string) => s;

export const plain: Palette = {
  dim: identity,
  red: identity,
  green: identity,
  yellow: identity,
  cyan: identity,
  bold: identity,
};

export const DEFAULT_REPORT_BASE = 'reports/migration-checklist';

export const USAGE = `
Usage: migration-checklist [options]

Run from the project root. Verifies that the WebSocket -> libp2p network
migration is complete and exits 0 when every check passes, 1 otherwise.
Options only add output; the checks always run.

Options:
  --report <path>        also write the JSON summary to <path>
  --format <md|html|all> also write a pretty report
  --out <base>           base path for pretty reports (default: ${DEFAULT_REPORT_BASE})
  --no-color             disable ANSI colours
  -h, --help             show this help
`.trim();

function isReportFormat(s: string): s is ReportFormat {
  return s === 'md' || s === 'html' || s === 'all';
}

// ---------- Helpers ----------

/**
 * Never throws: arguments it cannot use are listed in `ignored` and the run
 * goes ahead as if they were absent.
 */
export function parseCLI(argv: string[]): CLIOpts {
  const opts: CLIOpts = {
    help: false,
    reportPath: null,
    format: null,
    outBase: null,
    ignored: [],
  };

  const takeValue = (i: number, flag: string): string | null => {
    const v = argv[i + 1];
    if (v === undefined || v.startsWith('-')) {
      opts.ignored.push(`missing value for ${flag}`);
      return null;
    }
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case '--report': {
        const v = takeValue(i, a);
        if (v !== null) {
          opts.reportPath = v;
          i++;
        }
        break;
      }
      case '--format': {
        const v = takeValue(i, a);
        if (v === null) break;
        i++;
        if (isReportFormat(v)) opts.format = v;
        else opts.ignored.push(`unknown report format: ${v}`);
        break;
      }
      case '--out': {
        const v = takeValue(i, a);
        if (v !== null) {
          opts.outBase = v;
          i++;
        }
        break;
      }
      case '--no-color':
        opts.color = false;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        if (a?.startsWith('-')) {
          opts.ignored.push(`unknown flag: ${a}`);
        } else {
          // the tool always inspects the working directory
          opts.ignored.push(`unexpected argument: ${a}`);
        }
    }
  }

  // --out alone implies Markdown, like the default format
  if (opts.outBase && !opts.format) opts.format = 'md';
  return opts;
}

export function rule(width = 40) {
  return '='.repeat(width);
}
