import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import fg from 'fast-glob';
import matter from 'gray-matter';
import type { Check, Checklist, Requirement, Section } from './types';

export class ChecklistError extends Error {
  constructor(message: string, public file: string) {
    super(`${path.basename(file)}: ${message}`);
    this.name = 'ChecklistError';
  }
}

/** The check set shipped with the tool. */
export function defaultChecklistDir(): string {
  return fileURLToPath(
    new URL('../checklists/libp2p-migration', import.meta.url)
  );
}

type Fields = Record<string, unknown>;

function isFields(data: unknown): data is Fields {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function readString(data: Fields, key: string, file: string): string {
  const v = data[key];
  if (typeof v !== 'string' || !v.trim()) {
    throw new ChecklistError(`"${key}" must be a non-empty string`, file);
  }
  return v.trim();
}

function readStringList(data: Fields, key: string, file: string): string[] {
  const v = data[key];
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === 'string')) {
    throw new ChecklistError(`"${key}" must be a list of strings`, file);
  }
  return v;
}

function readList(data: Fields, key: string, file: string): Fields[] {
  const v = data[key];
  if (!Array.isArray(v) || !v.every(isFields)) {
    throw new ChecklistError(`"${key}" must be a list of mappings`, file);
  }
  return v;
}

function compilePattern(source: string, file: string): RegExp {
  try {
    // multi-line: ^ and $ also match at line boundaries
    return new RegExp(source, 'm');
  } catch (e) {
    throw new ChecklistError(
      `invalid pattern ${JSON.stringify(source)} (${
        e instanceof Error ? e.message : String(e)
      })`,
      file
    );
  }
}

// patterns are taken verbatim: surrounding spaces are part of the match
function readPattern(data: Fields, file: string): string {
  const v = data.pattern;
  if (typeof v !== 'string' || v.length === 0) {
    throw new ChecklistError('"pattern" must be a non-empty string', file);
  }
  return v;
}

function parseRequirement(data: Fields, file: string): Requirement {
  return {
    pattern: compilePattern(readPattern(data, file), file),
    description: readString(data, 'description', file),
  };
}

function parseCheck(data: Fields, file: string): Check {
  const kind = data.kind;
  const checkPath = readString(data, 'path', file);
  const description = readString(data, 'description', file);

  if (kind === 'exists') {
    return { kind, path: checkPath, description };
  }
  if (kind === 'content') {
    const requirements =
      data.requirements === undefined
        ? []
        : readList(data, 'requirements', file).map((r) =>
            parseRequirement(r, file)
          );
    return { kind, path: checkPath, description, requirements };
  }
  throw new ChecklistError(
    `check "${checkPath}" has unknown kind ${JSON.stringify(kind)}`,
    file
  );
}

async function readFrontMatter(filePath: string): Promise<Fields> {
  const raw = await fs.readFile(filePath, 'utf8');
  const data: unknown = matter(raw).data;
  if (!isFields(data) || Object.keys(data).length === 0) {
    throw new ChecklistError('missing front-matter', filePath);
  }
  return data;
}

export async function loadSection(filePath: string): Promise<Section> {
  const fm = await readFrontMatter(filePath);
  const order = fm.order;
  if (typeof order !== 'number' || !Number.isInteger(order) || order < 1) {
    throw new ChecklistError('"order" must be a positive integer', filePath);
  }
  const checks = readList(fm, 'checks', filePath).map((c) =>
    parseCheck(c, filePath)
  );
  if (checks.length === 0) {
    throw new ChecklistError('"checks" must not be empty', filePath);
  }
  return {
    order,
    title: readString(fm, 'title', filePath),
    checks,
    filePath,
  };
}

/**
 * Load a checklist directory:
 * - `checklist.md` carries the title, the precondition marker and the banners.
 * - `sections/*.md` each carry one numbered section; `order` must be unique.
 */
export async function loadChecklist(dir: string): Promise<Checklist> {
  const metaPath = path.join(dir, 'checklist.md');
  const meta = await readFrontMatter(metaPath);

  const files = await fg('sections/*.md', {
    cwd: dir,
    absolute: true,
    onlyFiles: true,
  });
  files.sort();

  const sections: Section[] = [];
  for (const filePath of files) {
    const section = await loadSection(filePath);
    const clash = sections.find((s) => s.order === section.order);
    if (clash) {
      throw new ChecklistError(
        `"order" ${section.order} is already used by ${path.basename(
          clash.filePath
        )}`,
        filePath
      );
    }
    sections.push(section);
  }
  if (sections.length === 0) {
    throw new ChecklistError('no sections found', metaPath);
  }
  sections.sort((a, b) => a.order - b.order);

  return {
    id: path.basename(dir),
    title: readString(meta, 'title', metaPath),
    marker: readString(meta, 'marker', metaPath),
    markerMissingMessage: readString(meta, 'markerMissingMessage', metaPath),
    successMessage: readString(meta, 'successMessage', metaPath),
    confirmations: readStringList(meta, 'confirmations', metaPath),
    nextSteps: readStringList(meta, 'nextSteps', metaPath),
    failureMessage: readString(meta, 'failureMessage', metaPath),
    sections,
  };
}
