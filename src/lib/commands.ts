/*
  Reversible commands
  -------------------
  A command mutates the live Dataset, records the change through the patch
  sink and moves the linked issue between OPEN and FIXED. Status commands
  touch the issue store (and the persisted exceptions) only.

  execute()/undo() are synchronous and are called by CommandHistory alone.
*/

import type { Dataset } from './dataset';
import type { IssueStore } from './issue-store';
import type { PatchSink } from './patch-sink';
import type { ProjectStore } from './project';
import type { ActionLogEntry, ActionScope, ActionType, CellValue, IssueStatus, Patch, SettingsMap } from './types';
import { generateId, nowIso } from './utils';

export type CommandType = 'fix:cell' | 'fix:bulk' | 'issue:status';

export interface Command {
  readonly id: string; // action id
  readonly type: CommandType;
  readonly label: string;
  /** Columns whose values this command changes. */
  readonly columns: readonly string[];
  execute(): void;
  undo(): void;
}

export interface CommandContext {
  dataset: Dataset;
  store: IssueStore;
  sink: PatchSink;
  project?: ProjectStore | null; // action log + exceptions
}

function logEntry(
  actionId: string,
  actionType: ActionType,
  scope: ActionScope,
  params: SettingsMap,
  patchIds: string[],
  stats: Record<string, number> = {}
): ActionLogEntry {
  return { actionId, timestamp: nowIso(), actionType, scope, params, stats, patchIds };
}

// --------------------------
// Single cell
// --------------------------
export interface CellFix {
  row: number;
  column: string;
  newValue: CellValue;
  issueId?: string | null;
}

export class CellFixCommand implements Command {
  readonly type = 'fix:cell';
  readonly id: string;
  readonly patchId: string;
  readonly label: string;
  readonly columns: readonly string[];
  readonly fix: Readonly<CellFix>;
  private readonly logActions: boolean;
  private oldValue: CellValue = null;
  private applied = false;
  private executions = 0;

  constructor(
    private readonly ctx: CommandContext,
    fix: CellFix,
    opts: { actionId?: string; index?: number; log?: boolean } = {}
  ) {
    this.fix = { ...fix, issueId: fix.issueId ?? null };
    this.id = opts.actionId ?? generateId();
    this.patchId = `${this.id}_p${opts.index ?? 0}`;
    this.columns = [fix.column];
    this.label = `Fix ${fix.column} row ${fix.row + 1}`;
    this.logActions = opts.log ?? true;
  }

  get previousValue(): CellValue {
    return this.oldValue;
  }

  execute(): void {
    const { dataset, store, sink } = this.ctx;
    const { row, column, newValue, issueId } = this.fix;
    this.oldValue = dataset.get(row, column);
    dataset.set(row, column, newValue);
    const patch: Patch = {
      patchId: this.patchId,
      actionId: this.id,
      row,
      column,
      oldValue: this.oldValue,
      newValue,
      issueId: issueId ?? null,
      timestamp: nowIso(),
    };
    sink.write(patch);
    if (issueId) store.setStatus(issueId, 'FIXED');
    this.applied = true;
    this.executions++;
    if (this.logActions) {
      this.ctx.project?.appendAction(
        logEntry(this.id, this.executions === 1 ? 'fix' : 'redo', 'cell', this.params(), [this.patchId])
      );
    }
  }

  undo(): void {
    if (!this.applied) return;
    const { dataset, store, sink } = this.ctx;
    const { row, column, issueId } = this.fix;
    dataset.set(row, column, this.oldValue);
    sink.delete(this.patchId);
    if (issueId) store.setStatus(issueId, 'OPEN');
    this.applied = false;
    if (this.logActions) this.ctx.project?.appendAction(logEntry(this.id, 'undo', 'cell', this.params(), [this.patchId]));
  }

  private params(): SettingsMap {
    return {
      row: this.fix.row,
      column: this.fix.column,
      oldValue: this.oldValue,
      newValue: this.fix.newValue,
      issueId: this.fix.issueId ?? null,
    };
  }
}

// --------------------------
// Bulk: one action, many cells
// --------------------------
export class BulkFixCommand implements Command {
  readonly type = 'fix:bulk';
  readonly id: string;
  readonly label: string;
  readonly columns: readonly string[];
  readonly children: readonly CellFixCommand[];
  private readonly params: SettingsMap;
  private executions = 0;

  constructor(
    private readonly ctx: CommandContext,
    fixes: readonly CellFix[],
    opts: { actionId?: string; label?: string; params?: SettingsMap } = {}
  ) {
    this.id = opts.actionId ?? generateId();
    this.children = fixes.map((f, i) => new CellFixCommand(ctx, f, { actionId: this.id, index: i, log: false }));
    this.columns = [...new Set(fixes.map((f) => f.column))];
    this.label = opts.label ?? `Fix ${fixes.length} cell${fixes.length === 1 ? '' : 's'}`;
    this.params = opts.params ?? {};
  }

  /** Applied in list order; a cell targeted twice ends with the later value. */
  execute(): void {
    for (const child of this.children) child.execute();
    this.executions++;
    this.log(this.executions === 1 ? 'bulk_fix' : 'redo');
  }

  /** Strict reverse order, so repeated cells return to their pre-bulk value. */
  undo(): void {
    for (let i = this.children.length - 1; i >= 0; i--) this.children[i].undo();
    this.log('undo');
  }

  private log(actionType: ActionType): void {
    const scope: ActionScope = this.columns.length === 1 ? 'column' : 'global';
    this.ctx.project?.appendAction(
      logEntry(
        this.id,
        actionType,
        scope,
        { ...this.params, columns: [...this.columns] },
        this.children.map((c) => c.patchId),
        { cells: this.children.length }
      )
    );
  }
}

// --------------------------
// Issue status (IGNORED / EXCEPTED <-> OPEN)
// --------------------------
export class SetIssueStatusCommand implements Command {
  readonly type = 'issue:status';
  readonly id: string;
  readonly label: string;
  readonly columns: readonly string[] = [];
  private readonly reason: string;
  private previous: IssueStatus | null = null;

  constructor(
    private readonly ctx: Pick<CommandContext, 'store' | 'project'>,
    readonly issueId: string,
    readonly status: IssueStatus,
    opts: { actionId?: string; reason?: string } = {}
  ) {
    this.id = opts.actionId ?? generateId();
    this.label = `Mark issue ${status.toLowerCase()}`;
    this.reason = opts.reason ?? '';
  }

  execute(): void {
    this.previous = null;
    const issue = this.ctx.store.get(this.issueId);
    if (!issue) return;
    this.previous = issue.status;
    this.apply(this.status);
    this.ctx.project?.appendAction(
      logEntry(this.id, 'status', 'cell', { issueId: this.issueId, from: this.previous, to: this.status }, [])
    );
  }

  undo(): void {
    if (this.previous === null) return;
    this.apply(this.previous);
    this.ctx.project?.appendAction(
      logEntry(this.id, 'undo', 'cell', { issueId: this.issueId, from: this.status, to: this.previous }, [])
    );
  }

  private apply(status: IssueStatus): void {
    this.ctx.store.setStatus(this.issueId, status);
    const project = this.ctx.project;
    if (!project) return;
    if (status === 'EXCEPTED') project.addException(this.issueId, this.reason);
    else if (status === 'IGNORED') project.addIgnored(this.issueId);
    else project.clearException(this.issueId);
  }
}
