// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  CheckResult,
  PrettyReportOptions,
  RunSummary,
  SectionResult,
} from './types';
import { DEFAULT_REPORT_BASE } from './utils';

const niceDate = () =>
  new Date().toLocaleString(undefined, {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
  });

function slugify(id: string) {
  return id
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/(^-|-$)/g, '');
}

const sectionId = (s: SectionResult) => `section-${s.order}-${slugify(s.title)}`;

const checkLabel = (r: CheckResult) => `${r.check.description}: ${r.check.path}`;

function statusNote(r: CheckResult): string | null {
  switch (r.status) {
    case 'missing':
      return 'not found';
    case 'unreadable':
      return `failed to read file - ${r.error ?? 'unknown error'}`;
    default:
      return null;
  }
}

/* ----------------------------- Markdown report ----------------------------- */

export function renderMarkdownReport(summary: RunSummary): string {
  const { title, checked, succeeded, failed, sections } = summary;
  const safe = (s: string) => s.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
  const badge = (ok: boolean) => (ok ? '✅' : '❌');

  const header = [
    `# 📋 ${title}`,
    ``,
    `**Generated:** ${niceDate()}`,
    ``,
    `| Checks | Passed | Failed |`,
    `| ---: | ---: | ---: |`,
    `| ${checked} | ${succeeded} | ${failed} |`,
    ``,
  ];

  if (!summary.preconditionMet) {
    return [
      ...header,
      `❌ **Not run:** the precondition marker file was not found.`,
      '',
    ].join('\n');
  }

  const dashboard = [
    `## 📊 Summary`,
    ``,
    `| Section | Status | Passed | Failed | Failed Checks |`,
    `|:------|:------:|------:|------:|:-------------|`,
    ...sections.map((s) => {
      const passCount = s.checks.filter((r) => r.pass).length;
      const failedList =
        s.checks
          .filter((r) => !r.pass)
          .map((r) => `\`${safe(r.check.path)}\``)
          .join(', ') || '—';
      return `| [${s.order}. ${safe(s.title)}](#${sectionId(s)}) | ${badge(
        s.pass
      )} | ${passCount} | ${s.checks.length - passCount} | ${failedList} |`;
    }),
  ].join('\n');

  const checkBlock = (r: CheckResult) => {
    const note = statusNote(r);
    const lines = [
      `- ${badge(r.pass)} **${safe(checkLabel(r))}**${
        note ? ` — _${safe(note)}_` : ''
      }`,
    ];
    for (const req of r.requirements) {
      lines.push(
        `  - ${badge(req.pass)} ${safe(req.description)} (\`${safe(
          req.pattern
        )}\`)`
      );
    }
    return lines.join('\n');
  };

  const details = sections
    .map((s) => {
      // failed first
      const ordered = [
        ...s.checks.filter((r) => !r.pass),
        ...s.checks.filter((r) => r.pass),
      ];
      return [
        `\n---\n`,
        `### ${badge(s.pass)} ${s.order}. ${safe(s.title)}`,
        `<a id="${sectionId(s)}"></a>`,
        ``,
        ...ordered.map(checkBlock),
        ``,
        `[Back to summary](#📊-summary)`,
      ].join('\n');
    })
    .join('\n');

  const footer = [
    `\n---`,
    `${summary.passed ? '✅ **Result: PASS**' : '❌ **Result: FAIL**'}`,
    '',
  ].join('\n');

  return [header.join('\n'), dashboard, details, footer].join('\n');
}

/* ------------------------------- HTML report ------------------------------- */

export const esc = (s: string) =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export function renderHtmlReport(summary: RunSummary): string {
  const { title, sections } = summary;

  const resultBadge = summary.passed
    ? `<span class="badge ok" role="status">PASS</span>`
    : `<span class="badge bad" role="status">FAIL</span>`;

  const summaryRows = sections
    .map((s) => {
      const passCount = s.checks.filter((r) => r.pass).length;
      const failedChecks =
        s.checks
          .filter((r) => !r.pass)
          .map((r) => esc(r.check.path))
          .join(', ') || '—';
      return `
        <tr>
          <td class="status">${s.pass ? '🟢' : '🔴'}</td>
          <th scope="row"><a href="#${sectionId(s)}">${s.order}. ${esc(
        s.title
      )}</a></th>
          <td class="num">${passCount}</td>
          <td class="num">${s.checks.length - passCount}</td>
          <td class="failed-list">${failedChecks}</td>
        </tr>`;
    })
    .join('\n');

  const checkBlock = (r: CheckResult) => {
    const note = statusNote(r);
    const reqs = r.requirements.length
      ? `<ul>${r.requirements
          .map(
            (req) =>
              `<li class="${req.pass ? 'ok' : 'bad'}">${
                req.pass ? '✅' : '❌'
              } ${esc(req.description)} <code>${esc(req.pattern)}</code></li>`
          )
          .join('')}</ul>`
      : '';
    return `
          <div class="check ${r.pass ? 'pass' : 'fail'}">
            <div class="check-head">
              <span class="badge ${r.pass ? 'ok' : 'bad'}">${
      r.pass ? 'PASS' : 'FAIL'
    }</span>
              <strong>${esc(checkLabel(r))}</strong>
            </div>
            ${note ? `<p class="muted">${esc(note)}</p>` : ''}
            ${reqs}
          </div>`;
  };

  const sectionBlocks = sections
    .map(
      (s) => `
        <section class="section ${s.pass ? 'ok' : 'bad'}" id="${sectionId(s)}">
          <h2>${s.pass ? '✅' : '❌'} ${s.order}. ${esc(s.title)}</h2>
          ${[
            ...s.checks.filter((r) => !r.pass),
            ...s.checks.filter((r) => r.pass),
          ]
            .map(checkBlock)
            .join('')}
          <p class="backlinks"><a href="#summary">Back to summary</a></p>
        </section>`
    )
    .join('\n');

  const body = summary.preconditionMet
    ? `
  <h2 id="summary">📊 Summary</h2>
  <table class="summary">
    <thead>
      <tr>
        <th scope="col">Status</th>
        <th scope="col">Section</th>
        <th scope="col">Passed</th>
        <th scope="col">Failed</th>
        <th scope="col">Failed Checks</th>
      </tr>
    </thead>
    <tbody>
      ${summaryRows}
    </tbody>
  </table>

  ${sectionBlocks}`
    : `<p class="muted">Not run: the precondition marker file was not found.</p>`;

  return `<!doctype html>
<html>
<head>
<meta charset="utf-8"/>
<title>${esc(title)}</title>
<style>
  :root{--bg:#0f1115;--panel:#171923;--ink:#e6e6e6;--muted:#9aa2b1;--ok:#22c55e;--bad:#ef4444;--hl:#60a5fa}
  html,body{margin:0;background:var(--bg);color:var(--ink);font:14px/1.5 ui-sans-serif,system-ui,Segoe UI,Roboto,Helvetica,Arial}
  a{color:var(--hl)}
  .wrap{max-width:1180px;margin:32px auto;padding:0 20px}
  .meta,.muted{color:var(--muted)}
  .badge{display:inline-block;padding:2px 8px;border-radius:6px;font-weight:700;font-size:12px}
  .badge.ok{color:var(--ok);border:1px solid rgba(34,197,94,.35)}
  .badge.bad{color:var(--bad);border:1px solid rgba(239,68,68,.35)}
  table.summary{width:100%;border-collapse:collapse;background:var(--panel)}
  table.summary th,table.summary td{padding:10px 12px;border-bottom:1px solid rgba(255,255,255,.06);text-align:left}
  table.summary td.num{text-align:right}
  section.section{background:var(--panel);border-radius:14px;margin:18px 0;padding:16px}
  .check{border:1px solid rgba(255,255,255,.08);border-radius:12px;padding:10px 12px;margin:8px 0}
  .check.fail{border-color:rgba(239,68,68,.35)}
  .check.pass{border-color:rgba(34,197,94,.35)}
  code{font-family:ui-monospace,SFMono-Regular,Menlo,Consolas,monospace;font-size:12px}
</style>
</head>
<body>
<div class="wrap">
  <header>
    <h1>📋 ${esc(title)} ${resultBadge}</h1>
    <div class="meta">Generated ${esc(niceDate())} · ${summary.checked} checks · ${
    summary.succeeded
  } passed · ${summary.failed} failed</div>
  </header>
  ${body}
</div>
</body>
</html>`;
}

/* ------------------------------ Write to disk ------------------------------ */

export async function writePrettyReport(
  summary: RunSummary,
  opts: PrettyReportOptions = {}
): Promise<string[]> {
  const format = opts.format ?? 'md';
  const base = opts.outBasePath ?? path.resolve(process.cwd(), DEFAULT_REPORT_BASE);
  await fs.mkdir(path.dirname(base), { recursive: true });

  const written: string[] = [];
  if (format === 'md' || format === 'all') {
    const p = `${base}.md`;
    await fs.writeFile(p, renderMarkdownReport(summary), 'utf8');
    written.push(p);
  }
  if (format === 'html' || format === 'all') {
    const p = `${base}.html`;
    await fs.writeFile(p, renderHtmlReport(summary), 'utf8');
    written.push(p);
  }
  return written;
}

/** Compiled patterns are stored as their source. */
export function toJson(summary: RunSummary): string {
  return JSON.stringify(
    summary,
    (_key, value: unknown) => (value instanceof RegExp ? value.source : value),
    2
  );
}

export async function writeJsonSummary(summary: RunSummary, reportPath: string) {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, toJson(summary), 'utf8');
}
