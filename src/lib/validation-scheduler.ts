/*
  Validation scheduler
  --------------------
  Runs validation off the caller's turn and applies results to the issue store
  in request order per column:
  - each request takes a sequence number and a snapshot of the dataset
  - the latest dispatched sequence is tracked per column (a full run also
    claims the whole-row sentinel)
  - on completion, columns claimed by a newer request are dropped; a full
    result with nothing dropped uses replaceAll, anything else replaceForColumns
  - IGNORED / EXCEPTED statuses carry over to re-found issues with the same id
*/

import * as logger from 'firebase-functions/logger';
import type { Dataset } from './dataset';
import type { IssueStore } from './issue-store';
import type { ValidationEngine } from './rules-engine';
import type { CompiledConfig } from './template';
import { WHOLE_ROW, type Issue } from './types';
import { errorMessage } from './utils';

export type ValidationRunner = (snapshot: Dataset, columns: readonly string[] | null, config: CompiledConfig) => Promise<Issue[]>;

/** Engine on the next macrotask, in this process. */
export function inProcessRunner(engine: ValidationEngine): ValidationRunner {
  return (snapshot, columns, config) =>
    new Promise<Issue[]>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(engine.validate(snapshot, columns, config));
        } catch (e) {
          reject(e);
        }
      });
    });
}

export type ApplyMode = 'all' | 'columns' | 'stale';

export interface AppliedResult {
  seq: number;
  mode: ApplyMode;
  columns: string[]; // columns (and sentinel) actually replaced
  issueCount: number;
}

export interface SchedulerOptions {
  dataset: Dataset;
  store: IssueStore;
  runner: ValidationRunner;
  onApplied?: (result: AppliedResult) => void;
}

export class ValidationScheduler {
  private seq = 0;
  private readonly latest = new Map<string, number>();
  private inFlight = 0;

  constructor(private readonly opts: SchedulerOptions) {}

  get pending(): number {
    return this.inFlight;
  }

  /** columns = null for a full run. */
  async request(columns: readonly string[] | null, config: CompiledConfig): Promise<AppliedResult> {
    const seq = ++this.seq;
    const scope = columns === null ? [...this.opts.dataset.columns, WHOLE_ROW] : [...new Set(columns)];
    for (const c of scope) this.latest.set(c, seq);
    const snapshot = this.opts.dataset.snapshot();

    this.inFlight++;
    let issues: Issue[];
    try {
      issues = await this.opts.runner(snapshot, columns, config);
    } catch (e) {
      logger.error('Validation run failed', { seq, columns: columns ?? 'all', error: errorMessage(e) });
      throw e;
    } finally {
      this.inFlight--;
    }

    const result = this.apply(seq, columns === null, scope, issues);
    logger.debug('Validation applied', { ...result, columns: result.columns.length });
    this.opts.onApplied?.(result);
    return result;
  }

  private apply(seq: number, full: boolean, scope: string[], issues: Issue[]): AppliedResult {
    const { store } = this.opts;
    const fresh = scope.filter((c) => this.latest.get(c) === seq);
    if (fresh.length === 0) return { seq, mode: 'stale', columns: [], issueCount: 0 };

    const freshSet = new Set(fresh);
    const kept = issues.filter((i) => freshSet.has(i.column));
    for (const issue of kept) {
      const prev = store.get(issue.id);
      if (prev && (prev.status === 'IGNORED' || prev.status === 'EXCEPTED')) issue.status = prev.status;
    }

    if (full && fresh.length === scope.length) {
      store.replaceAll(kept);
      return { seq, mode: 'all', columns: fresh, issueCount: kept.length };
    }
    store.replaceForColumns(fresh, kept);
    return { seq, mode: 'columns', columns: fresh, issueCount: kept.length };
  }
}
