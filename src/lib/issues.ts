import * as crypto from 'crypto';
import type { CellValue, Issue, Severity, SettingsMap } from './types';

const SEVERITY_RANK: Record<Severity, number> = { ERROR: 0, WARNING: 1, SUSPICION: 2 };

/**
 * Deterministic issue identity: first 12 hex chars of sha256 over
 * `[ruleId, column, row, original]`, with an empty cell hashed as "".
 */
export function makeIssueId(ruleId: string, column: string, row: number, original: CellValue): string {
  const payload = JSON.stringify([ruleId, column, row, original ?? '']);
  return crypto.createHash('sha256').update(payload, 'utf8').digest('hex').slice(0, 12);
}

export interface IssueInit {
  ruleId: string;
  severity: Severity;
  row: number;
  column: string;
  original: CellValue;
  message: string;
  suggestion?: CellValue;
  extra?: SettingsMap;
}

export function createIssue(init: IssueInit): Issue {
  return {
    id: makeIssueId(init.ruleId, init.column, init.row, init.original),
    ruleId: init.ruleId,
    severity: init.severity,
    status: 'OPEN',
    row: init.row,
    column: init.column,
    original: init.original,
    message: init.message,
    suggestion: init.suggestion,
    extra: init.extra ?? {},
  };
}

// negative when a is more severe than b
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function worstSeverity(severities: Iterable<Severity>): Severity | null {
  let worst: Severity | null = null;
  for (const s of severities) {
    if (worst === null || compareSeverity(s, worst) < 0) worst = s;
  }
  return worst;
}

export function isSeverity(v: unknown): v is Severity {
  return v === 'ERROR' || v === 'WARNING' || v === 'SUSPICION';
}
