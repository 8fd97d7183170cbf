import { mkdtempSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Dataset } from '../lib/dataset';
import { createIssue } from '../lib/issues';
import type { Rule } from '../lib/rule-registry';
import type { CellValue, Issue, Severity, SettingsMap } from '../lib/types';
import type { VocabularyProvider } from '../lib/vocabulary';

export function tmpDir(prefix = 'sheetcheck-'): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** One-column dataset named "c" unless told otherwise. */
export function columnOf(values: CellValue[], name = 'c'): Dataset {
  return Dataset.fromColumns({ [name]: values });
}

export function runRule(
  rule: Rule,
  dataset: Dataset,
  column: string | null,
  settings: SettingsMap = {},
  vocabulary: VocabularyProvider | null = null
): Issue[] {
  return rule.check(dataset, column, { settings, vocabulary });
}

export function issue(ruleId: string, column: string, row: number, original: CellValue, severity: Severity = 'WARNING'): Issue {
  return createIssue({ ruleId, severity, row, column, original, message: `${ruleId} at ${column}:${row}` });
}

export const rows = (issues: Issue[]) => issues.map((i) => i.row);
