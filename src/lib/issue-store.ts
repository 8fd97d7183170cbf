import { worstSeverity } from './issues';
import { WHOLE_ROW, type Issue, type IssueStatus, type Severity } from './types';

const cellKey = (row: number, column: string) => `${row}\u0000${column}`;

function addTo<K>(index: Map<K, Map<string, Issue>>, key: K, issue: Issue): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Map();
    index.set(key, bucket);
  }
  bucket.set(issue.id, issue);
}

function removeFrom<K>(index: Map<K, Map<string, Issue>>, key: K, id: string): void {
  const bucket = index.get(key);
  if (!bucket) return;
  bucket.delete(id);
  if (bucket.size === 0) index.delete(key);
}

/**
 * Issues indexed by id, by column and by cell. Every mutation keeps the three
 * indices in step; an id lives in exactly one bucket of each.
 */
export class IssueStore {
  private readonly byIdIndex = new Map<string, Issue>();
  private readonly byColumnIndex = new Map<string, Map<string, Issue>>();
  private readonly byCellIndex = new Map<string, Map<string, Issue>>();

  replaceAll(issues: Iterable<Issue>): void {
    this.byIdIndex.clear();
    this.byColumnIndex.clear();
    this.byCellIndex.clear();
    for (const issue of issues) this.insert(issue);
  }

  /**
   * Drop every issue of the named columns, then insert the supplied issues
   * that belong to those columns or to the whole-row sentinel.
   */
  replaceForColumns(columns: Iterable<string>, issues: Iterable<Issue>): void {
    const scope = new Set(columns);
    for (const column of scope) {
      const bucket = this.byColumnIndex.get(column);
      if (!bucket) continue;
      for (const issue of [...bucket.values()]) this.remove(issue);
    }
    for (const issue of issues) {
      if (scope.has(issue.column) || issue.column === WHOLE_ROW) this.insert(issue);
    }
  }

  /** Status only; the issue keeps its place in every index. Unknown ids are ignored. */
  setStatus(issueId: string, status: IssueStatus): void {
    const issue = this.byIdIndex.get(issueId);
    if (issue) issue.status = status;
  }

  get(issueId: string): Issue | undefined {
    return this.byIdIndex.get(issueId);
  }

  all(): Issue[] {
    return [...this.byIdIndex.values()];
  }

  open(): Issue[] {
    return this.all().filter((i) => i.status === 'OPEN');
  }

  get size(): number {
    return this.byIdIndex.size;
  }

  byColumn(column: string): Issue[] {
    return [...(this.byColumnIndex.get(column)?.values() ?? [])];
  }

  byCell(row: number, column: string): Issue[] {
    return [...(this.byCellIndex.get(cellKey(row, column))?.values() ?? [])];
  }

  hasIssuesForCell(row: number, column: string): boolean {
    return this.byCellIndex.has(cellKey(row, column));
  }

  worstSeverityForCell(row: number, column: string): Severity | null {
    return worstSeverity(this.byCell(row, column).filter((i) => i.status === 'OPEN').map((i) => i.severity));
  }

  countBySeverity(): Record<Severity, number> {
    const out: Record<Severity, number> = { ERROR: 0, WARNING: 0, SUSPICION: 0 };
    for (const issue of this.byIdIndex.values()) if (issue.status === 'OPEN') out[issue.severity]++;
    return out;
  }

  private insert(issue: Issue): void {
    const existing = this.byIdIndex.get(issue.id);
    if (existing) this.remove(existing);
    this.byIdIndex.set(issue.id, issue);
    addTo(this.byColumnIndex, issue.column, issue);
    addTo(this.byCellIndex, cellKey(issue.row, issue.column), issue);
  }

  private remove(issue: Issue): void {
    this.byIdIndex.delete(issue.id);
    removeFrom(this.byColumnIndex, issue.column, issue.id);
    removeFrom(this.byCellIndex, cellKey(issue.row, issue.column), issue.id);
  }
}
