import { describe, it, expect } from 'vitest';
import { IssueStore } from '../lib/issue-store';
import { WHOLE_ROW } from '../lib/types';
import { issue } from './helpers';

describe('IssueStore', () => {
  const a0 = issue('r1', 'A', 0, 'x', 'ERROR');
  const a1 = issue('r1', 'A', 1, 'y');
  const b0 = issue('r1', 'B', 0, 'z', 'SUSPICION');
  const b0w = issue('r2', 'B', 0, 'z', 'WARNING');

  it('indexes by id, column and cell', () => {
    const store = new IssueStore();
    store.replaceAll([a0, a1, b0, b0w]);
    expect(store.size).toBe(4);
    expect(store.get(a1.id)).toBe(a1);
    expect(store.byColumn('A').map((i) => i.id)).toEqual([a0.id, a1.id]);
    expect(store.byCell(0, 'B').map((i) => i.id)).toEqual([b0.id, b0w.id]);
    expect(store.hasIssuesForCell(1, 'B')).toBe(false);
  });

  it('leaves other columns untouched on a column-scoped replace', () => {
    const store = new IssueStore();
    store.replaceAll([{ ...a0 }, { ...a1 }, { ...b0 }, { ...b0w }]);
    const before = store.byColumn('B');
    const fresh = issue('r3', 'A', 2, 'q');
    store.replaceForColumns(['A'], [fresh, issue('r3', 'C', 0, 'ignored')]);

    expect(store.byColumn('A').map((i) => i.id)).toEqual([fresh.id]);
    const after = store.byColumn('B');
    expect(after).toHaveLength(2);
    after.forEach((i, n) => expect(i).toBe(before[n]));
    expect(store.byColumn('C')).toEqual([]);
    expect(store.hasIssuesForCell(0, 'A')).toBe(false);
  });

  it('accepts whole-row issues on a column-scoped replace', () => {
    const store = new IssueStore();
    const dup = issue('generic.duplicate_rows', WHOLE_ROW, 4, null);
    store.replaceForColumns(['A'], [dup]);
    expect(store.byCell(4, WHOLE_ROW)).toEqual([dup]);
  });

  it('keeps one entry per id', () => {
    const store = new IssueStore();
    const again = { ...a0, message: 'second' };
    store.replaceAll([a0, again]);
    expect(store.size).toBe(1);
    expect(store.get(a0.id)?.message).toBe('second');
    expect(store.byCell(0, 'A')).toHaveLength(1);
    expect(store.byColumn('A')).toHaveLength(1);
  });

  it('changes status in place and ignores unknown ids', () => {
    const store = new IssueStore();
    store.replaceAll([{ ...a0 }, { ...b0 }]);
    store.setStatus(a0.id, 'IGNORED');
    store.setStatus('nope', 'FIXED');
    expect(store.get(a0.id)?.status).toBe('IGNORED');
    expect(store.byCell(0, 'A')[0].status).toBe('IGNORED');
    expect(store.size).toBe(2);
  });

  it('counts and ranks OPEN issues only', () => {
    const store = new IssueStore();
    store.replaceAll([{ ...a0 }, { ...a1 }, { ...b0 }, { ...b0w }]);
    store.setStatus(b0w.id, 'EXCEPTED');
    expect(store.countBySeverity()).toEqual({ ERROR: 1, WARNING: 1, SUSPICION: 1 });
    expect(store.worstSeverityForCell(0, 'B')).toBe('SUSPICION');
    store.setStatus(b0.id, 'FIXED');
    expect(store.worstSeverityForCell(0, 'B')).toBeNull();
    expect(store.open().map((i) => i.id)).toEqual([a0.id, a1.id]);
  });
});
