import { defineRule, type Rule } from '../rule-registry';
import { WHOLE_ROW, type Issue } from '../types';

/** Whole-table rule: every repeat of an earlier row is flagged on the row sentinel. */
export const duplicateRows: Rule = defineRule({
  id: 'generic.duplicate_rows',
  name: 'Duplicate rows',
  defaultSeverity: 'WARNING',
  scope: 'table',
  run(dataset, ctx) {
    const firstSeen = new Map<string, number>();
    const issues: Issue[] = [];
    for (let row = 0; row < dataset.rowCount; row++) {
      const key = JSON.stringify(dataset.row(row));
      const first = firstSeen.get(key);
      if (first === undefined) {
        firstSeen.set(key, row);
        continue;
      }
      issues.push(
        ctx.flag({
          row,
          column: WHOLE_ROW,
          original: null,
          message: `Row ${row + 1} duplicates row ${first + 1}`,
          extra: { duplicateOf: first },
        })
      );
    }
    return issues;
  },
});

export const uniqueColumn: Rule = defineRule({
  id: 'generic.unique_column',
  name: 'Unique column violation',
  defaultSeverity: 'ERROR',
  scope: 'column',
  run(dataset, column, ctx) {
    if (ctx.settings.unique !== true) return [];
    const seen = new Set<string>();
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null) return;
      if (!seen.has(v)) {
        seen.add(v);
        return;
      }
      issues.push(ctx.flag({ row, column, original: v, message: `Duplicate value "${v}" in unique column "${column}"` }));
    });
    return issues;
  },
});

export const duplicateRules: Rule[] = [duplicateRows, uniqueColumn];
