export * from './types';
export { Dataset } from './dataset';
export { loadDataset, parseDelimitedText, sniffDelimiter, uniqueHeader, type LoadOptions, type LoadedDataset } from './dataset-loader';
export { createIssue, makeIssueId, compareSeverity, worstSeverity } from './issues';
export { IssueStore } from './issue-store';
export {
  createRegistry,
  defineRule,
  RuleRegistry,
  type Rule,
  type RuleConfig,
  type RuleContext,
  type RuleDefinition,
} from './rule-registry';
export { builtinRules, registerBuiltinRules } from './rules';
export { ValidationEngine, effectiveSettings } from './rules-engine';
export { compileTemplate, deepMerge, emptyConfig, globToRegExp, parseTemplate, resolveColumns, type CompiledConfig, type TemplateDocument } from './template';
export { TemplateManager, BUILTIN_TEMPLATES_DIR } from './template-manager';
export { StaticVocabulary, RemoteVocabularyClient, type VocabularyProvider } from './vocabulary';
export { BulkFixCommand, CellFixCommand, SetIssueStatusCommand, type CellFix, type Command } from './commands';
export { CommandHistory, DEFAULT_HISTORY_DEPTH } from './history';
export { FilePatchSink, MemoryPatchSink, NullPatchSink, type PatchSink } from './patch-sink';
export { NullProjectFolder, ProjectFolder, type ProjectStore } from './project';
export { ValidationScheduler, inProcessRunner, type AppliedResult, type ValidationRunner } from './validation-scheduler';
export { ReviewSession, type ColumnTransform, type SessionSummary } from './session';
export { loadSettings, type Settings } from './settings';
export { bootstrap, type App, type BootstrapOptions, type OpenOptions } from './bootstrap';
