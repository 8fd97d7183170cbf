export type Severity = 'ERROR' | 'WARNING' | 'SUSPICION';
export type IssueStatus = 'OPEN' | 'FIXED' | 'IGNORED' | 'EXCEPTED';
export type RuleScope = 'column' | 'table';
export type TemplateType = 'generic' | 'overlay';
export type TemplateScope = 'builtin' | 'user' | 'project';
export type ActionType = 'fix' | 'bulk_fix' | 'status' | 'undo' | 'redo';
export type ActionScope = 'cell' | 'column' | 'global';

export const SEVERITIES: readonly Severity[] = ['ERROR', 'WARNING', 'SUSPICION'];
export const ISSUE_STATUSES: readonly IssueStatus[] = ['OPEN', 'FIXED', 'IGNORED', 'EXCEPTED'];

/** Column marker for findings that concern a whole row rather than one cell. */
export const WHOLE_ROW = '__row__';

export type CellValue = string | null;

// JSON-shaped settings as they come out of a template document
export type SettingValue = string | number | boolean | null | SettingValue[] | SettingsMap;
export interface SettingsMap {
  [key: string]: SettingValue;
}

export interface Issue {
  id: string;
  ruleId: string;
  severity: Severity;
  status: IssueStatus;
  row: number; // 0-based data row
  column: string; // or WHOLE_ROW
  original: CellValue;
  message: string;
  suggestion: CellValue | undefined;
  extra: SettingsMap;
}

export interface Patch {
  patchId: string;
  actionId: string; // groups patches belonging to one user action
  row: number;
  column: string;
  oldValue: CellValue;
  newValue: CellValue;
  issueId: string | null;
  timestamp: string; // ISO-8601 UTC
}

export interface ActionLogEntry {
  actionId: string;
  timestamp: string;
  actionType: ActionType;
  scope: ActionScope;
  params: SettingsMap;
  stats: Record<string, number>;
  patchIds: string[];
}

export interface DatasetMeta {
  filePath: string;
  encoding: string;
  delimiter: string | null; // null for workbooks
  sheetName: string | null; // null for delimited text
  headerRow: number; // 0-based
  skipRows: number;
  shape: [rows: number, columns: number];
  columnOrder: string[];
  fingerprint: string; // sha256 of the first 64 KiB
}

export interface TemplateInfo {
  id: string;
  name: string;
  scope: TemplateScope;
  type: TemplateType;
  path: string;
  readonly: boolean;
}
