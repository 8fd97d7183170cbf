/*
  Project folder
  --------------
    <dir>/project.json
    <dir>/input/                 copies of loaded source files
    <dir>/templates/             project-scoped templates
    <dir>/reports/, exports/
    <dir>/work/patches/          one JSON file per applied patch
    <dir>/work/patches/undone/   archived (undone) patches
    <dir>/work/actions_log.jsonl
    <dir>/work/exceptions.json   EXCEPTED / IGNORED issue ids
*/

import { appendFileSync, copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import type { IssueStore } from './issue-store';
import { FilePatchSink, NullPatchSink, type PatchSink } from './patch-sink';
import { SettingsMapSchema } from './template';
import type { ActionLogEntry, DatasetMeta } from './types';
import { errorMessage, nowIso } from './utils';

// --------------------------
// Schemas
// --------------------------
const ActionLogEntrySchema = z.object({
  actionId: z.string(),
  timestamp: z.string(),
  actionType: z.enum(['fix', 'bulk_fix', 'status', 'undo', 'redo']),
  scope: z.enum(['cell', 'column', 'global']),
  params: SettingsMapSchema,
  stats: z.record(z.number()),
  patchIds: z.array(z.string()),
});

const ExceptionsSchema = z.object({
  cellExceptions: z.array(z.object({ issueId: z.string(), reason: z.string().default('') })).default([]),
  ignoredIssues: z.array(z.string()).default([]),
});
export type Exceptions = z.infer<typeof ExceptionsSchema>;

const ProjectFileSchema = z.object({
  version: z.literal(1),
  sourceFile: z.string(),
  template: z.string(),
  overlay: z.string().nullable(),
  headerRow: z.number().int().positive(), // 1-based
  encoding: z.string(),
  delimiter: z.string().nullable(),
  sheetName: z.string().nullable(),
  fingerprint: z.string(),
  createdAt: z.string(),
});
export type ProjectFile = z.infer<typeof ProjectFileSchema>;

export const emptyExceptions = (): Exceptions => ({ cellExceptions: [], ignoredIssues: [] });

export interface ProjectStore {
  patchSink(): PatchSink;
  appendAction(entry: ActionLogEntry): void;
  readActionLog(): ActionLogEntry[];
  loadExceptions(): Exceptions;
  saveExceptions(exceptions: Exceptions): void;
  addException(issueId: string, reason?: string): void;
  addIgnored(issueId: string): void;
  clearException(issueId: string): void;
  applyExceptionsToStore(store: IssueStore): void;
  saveProject(meta: DatasetMeta, templates: { template: string; overlay: string | null }): void;
  loadProject(): ProjectFile | null;
}

export function applyExceptions(exceptions: Exceptions, store: IssueStore): void {
  for (const e of exceptions.cellExceptions) store.setStatus(e.issueId, 'EXCEPTED');
  for (const id of exceptions.ignoredIssues) store.setStatus(id, 'IGNORED');
}

// --------------------------
// File-backed project
// --------------------------
export class ProjectFolder implements ProjectStore {
  readonly patchesDir: string;
  readonly templatesDir: string;
  private readonly logPath: string;
  private readonly exceptionsPath: string;
  private readonly projectPath: string;
  private sink: FilePatchSink | null = null;

  constructor(readonly dir: string) {
    for (const sub of ['work/patches/undone', 'reports', 'exports', 'input', 'templates']) {
      mkdirSync(path.join(dir, sub), { recursive: true });
    }
    this.patchesDir = path.join(dir, 'work', 'patches');
    this.templatesDir = path.join(dir, 'templates');
    this.logPath = path.join(dir, 'work', 'actions_log.jsonl');
    this.exceptionsPath = path.join(dir, 'work', 'exceptions.json');
    this.projectPath = path.join(dir, 'project.json');
  }

  patchSink(): FilePatchSink {
    this.sink ??= new FilePatchSink(this.patchesDir);
    return this.sink;
  }

  appendAction(entry: ActionLogEntry): void {
    appendFileSync(this.logPath, `${JSON.stringify(entry)}\n`, 'utf8');
  }

  readActionLog(): ActionLogEntry[] {
    if (!existsSync(this.logPath)) return [];
    const entries: ActionLogEntry[] = [];
    for (const line of readFileSync(this.logPath, 'utf8').split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed = ActionLogEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) entries.push(parsed.data);
        else logger.debug('Skipping malformed action log line', { line: line.slice(0, 80) });
      } catch (e) {
        logger.debug('Skipping invalid JSON in action log', { line: line.slice(0, 80), error: errorMessage(e) });
      }
    }
    return entries;
  }

  loadExceptions(): Exceptions {
    if (!existsSync(this.exceptionsPath)) return emptyExceptions();
    try {
      const parsed = ExceptionsSchema.safeParse(JSON.parse(readFileSync(this.exceptionsPath, 'utf8')));
      if (parsed.success) return parsed.data;
      logger.warn('Exceptions file has an unexpected shape, ignoring', { file: this.exceptionsPath });
    } catch (e) {
      logger.warn('Exceptions file unreadable, ignoring', { file: this.exceptionsPath, error: errorMessage(e) });
    }
    return emptyExceptions();
  }

  saveExceptions(exceptions: Exceptions): void {
    writeFileSync(this.exceptionsPath, JSON.stringify(exceptions, null, 2), 'utf8');
  }

  addException(issueId: string, reason = ''): void {
    const exc = this.loadExceptions();
    exc.ignoredIssues = exc.ignoredIssues.filter((id) => id !== issueId);
    if (!exc.cellExceptions.some((e) => e.issueId === issueId)) exc.cellExceptions.push({ issueId, reason });
    this.saveExceptions(exc);
  }

  addIgnored(issueId: string): void {
    const exc = this.loadExceptions();
    exc.cellExceptions = exc.cellExceptions.filter((e) => e.issueId !== issueId);
    if (!exc.ignoredIssues.includes(issueId)) exc.ignoredIssues.push(issueId);
    this.saveExceptions(exc);
  }

  clearException(issueId: string): void {
    const exc = this.loadExceptions();
    const before = exc.cellExceptions.length + exc.ignoredIssues.length;
    exc.cellExceptions = exc.cellExceptions.filter((e) => e.issueId !== issueId);
    exc.ignoredIssues = exc.ignoredIssues.filter((id) => id !== issueId);
    if (exc.cellExceptions.length + exc.ignoredIssues.length !== before) this.saveExceptions(exc);
  }

  applyExceptionsToStore(store: IssueStore): void {
    applyExceptions(this.loadExceptions(), store);
  }

  saveProject(meta: DatasetMeta, templates: { template: string; overlay: string | null }): void {
    const data: ProjectFile = {
      version: 1,
      sourceFile: meta.filePath,
      template: templates.template,
      overlay: templates.overlay,
      headerRow: meta.headerRow + 1,
      encoding: meta.encoding,
      delimiter: meta.delimiter,
      sheetName: meta.sheetName,
      fingerprint: meta.fingerprint,
      createdAt: nowIso(),
    };
    writeFileSync(this.projectPath, JSON.stringify(data, null, 2), 'utf8');
  }

  loadProject(): ProjectFile | null {
    if (!existsSync(this.projectPath)) return null;
    try {
      const parsed = ProjectFileSchema.safeParse(JSON.parse(readFileSync(this.projectPath, 'utf8')));
      if (parsed.success) return parsed.data;
      logger.warn('Project file has an unexpected shape', { file: this.projectPath });
    } catch (e) {
      logger.warn('Project file unreadable', { file: this.projectPath, error: errorMessage(e) });
    }
    return null;
  }

  /** Copy a source file into input/ (no-op when it already lives there). */
  copyInputFile(source: string): string {
    const dest = path.join(this.dir, 'input', path.basename(source));
    if (path.resolve(dest) !== path.resolve(source)) copyFileSync(source, dest);
    return dest;
  }
}

// --------------------------
// No project open
// --------------------------
export class NullProjectFolder implements ProjectStore {
  private readonly sink = new NullPatchSink();

  patchSink(): PatchSink {
    return this.sink;
  }
  appendAction(_entry: ActionLogEntry): void {}
  readActionLog(): ActionLogEntry[] {
    return [];
  }
  loadExceptions(): Exceptions {
    return emptyExceptions();
  }
  saveExceptions(_exceptions: Exceptions): void {}
  addException(_issueId: string, _reason?: string): void {}
  addIgnored(_issueId: string): void {}
  clearException(_issueId: string): void {}
  applyExceptionsToStore(_store: IssueStore): void {}
  saveProject(_meta: DatasetMeta, _templates: { template: string; overlay: string | null }): void {}
  loadProject(): ProjectFile | null {
    return null;
  }
}
