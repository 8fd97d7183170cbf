/*
  Review session
  --------------
  What a UI or transport layer talks to. Owns the issue store, the history and
  the scheduler for one loaded dataset:
    validateAll / revalidate(columns)
    applyFix / fixIssue / applyBulk / normalizeColumn / setIssueStatus
    undo / redo
  Cell-changing actions re-validate the columns they touched.
*/

import { BulkFixCommand, CellFixCommand, SetIssueStatusCommand, type CellFix, type Command } from './commands';
import type { Dataset } from './dataset';
import { CommandHistory, DEFAULT_HISTORY_DEPTH } from './history';
import { IssueStore } from './issue-store';
import { NullProjectFolder, type ProjectStore } from './project';
import { asciiPunctuation, collapseSpaces, joinLines, stripInvisible } from './rules/text';
import type { ValidationEngine } from './rules-engine';
import type { CompiledConfig } from './template';
import type { CellValue, IssueStatus, Severity } from './types';
import { inProcessRunner, ValidationScheduler, type AppliedResult, type ValidationRunner } from './validation-scheduler';

export type ColumnTransform = 'trim' | 'collapse_spaces' | 'strip_invisible' | 'ascii_punctuation' | 'join_lines';

const TRANSFORMS: Record<ColumnTransform, (v: string) => string> = {
  trim: (v) => v.trim(),
  collapse_spaces: collapseSpaces,
  strip_invisible: stripInvisible,
  ascii_punctuation: asciiPunctuation,
  join_lines: joinLines,
};

export interface ReviewSessionOptions {
  dataset: Dataset;
  engine: ValidationEngine;
  config: CompiledConfig;
  project?: ProjectStore;
  historyDepth?: number;
  runner?: ValidationRunner;
}

export interface SessionSummary {
  rows: number;
  columns: number;
  issues: number;
  open: Record<Severity, number>;
  canUndo: boolean;
  canRedo: boolean;
}

export class ReviewSession {
  readonly dataset: Dataset;
  readonly store = new IssueStore();
  readonly history: CommandHistory;
  readonly project: ProjectStore;
  private readonly scheduler: ValidationScheduler;
  private config: CompiledConfig;

  constructor(opts: ReviewSessionOptions) {
    this.dataset = opts.dataset;
    this.config = opts.config;
    this.project = opts.project ?? new NullProjectFolder();
    this.history = new CommandHistory(opts.historyDepth ?? DEFAULT_HISTORY_DEPTH);
    this.scheduler = new ValidationScheduler({
      dataset: this.dataset,
      store: this.store,
      runner: opts.runner ?? inProcessRunner(opts.engine),
      onApplied: (r) => {
        if (r.mode !== 'stale') this.project.applyExceptionsToStore(this.store);
      },
    });
  }

  /** Takes effect from the next validation request. */
  setConfig(config: CompiledConfig): void {
    this.config = config;
  }

  validateAll(): Promise<AppliedResult> {
    return this.scheduler.request(null, this.config);
  }

  revalidate(columns: readonly string[]): Promise<AppliedResult> {
    return this.scheduler.request(columns, this.config);
  }

  // --------------------------
  // Fixes
  // --------------------------
  private context() {
    return { dataset: this.dataset, store: this.store, sink: this.project.patchSink(), project: this.project };
  }

  async applyFix(fix: CellFix): Promise<CellFixCommand> {
    const cmd = new CellFixCommand(this.context(), fix);
    this.history.push(cmd);
    await this.revalidate(cmd.columns);
    return cmd;
  }

  /** Apply an issue's suggestion (or an explicit value) to its cell. */
  async fixIssue(issueId: string, value?: CellValue): Promise<CellFixCommand | null> {
    const issue = this.store.get(issueId);
    if (!issue || !this.dataset.hasColumn(issue.column)) return null;
    const newValue = value !== undefined ? value : issue.suggestion;
    if (newValue === undefined) return null;
    return this.applyFix({ row: issue.row, column: issue.column, newValue, issueId });
  }

  async applyBulk(fixes: readonly CellFix[], label?: string): Promise<BulkFixCommand | null> {
    if (fixes.length === 0) return null;
    const cmd = new BulkFixCommand(this.context(), fixes, { label });
    this.history.push(cmd);
    await this.revalidate(cmd.columns);
    return cmd;
  }

  /**
   * One bulk action rewriting every cell of a column the transform changes.
   * An open issue whose suggestion equals the new value is linked to the patch.
   */
  async normalizeColumn(column: string, transform: ColumnTransform): Promise<BulkFixCommand | null> {
    const fn = TRANSFORMS[transform];
    const fixes: CellFix[] = [];
    this.dataset.column(column).forEach((v, row) => {
      if (v === null) return;
      const next = fn(v);
      if (next === v) return;
      const linked = this.store.byCell(row, column).find((i) => i.status === 'OPEN' && i.suggestion === next);
      fixes.push({ row, column, newValue: next, issueId: linked?.id ?? null });
    });
    return this.applyBulk(fixes, `${transform} on ${column}`);
  }

  setIssueStatus(issueId: string, status: IssueStatus, reason?: string): SetIssueStatusCommand | null {
    if (!this.store.get(issueId)) return null;
    const cmd = new SetIssueStatusCommand(this.context(), issueId, status, { reason });
    this.history.push(cmd);
    return cmd;
  }

  // --------------------------
  // History
  // --------------------------
  async undo(): Promise<Command | null> {
    const cmd = this.history.undo();
    if (cmd && cmd.columns.length > 0) await this.revalidate(cmd.columns);
    return cmd;
  }

  async redo(): Promise<Command | null> {
    const cmd = this.history.redo();
    if (cmd && cmd.columns.length > 0) await this.revalidate(cmd.columns);
    return cmd;
  }

  summary(): SessionSummary {
    return {
      rows: this.dataset.rowCount,
      columns: this.dataset.columns.length,
      issues: this.store.size,
      open: this.store.countBySeverity(),
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
    };
  }
}
