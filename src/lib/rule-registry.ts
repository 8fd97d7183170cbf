/*
  Rule registry
  -------------
  Rules are plain values built with defineRule() and collected in an explicit
  RuleRegistry that bootstrap() fills and hands to the engine and the
  template compiler. There is no module-level instance.
*/

import type { Dataset } from './dataset';
import { createIssue, isSeverity, type IssueInit } from './issues';
import type { Issue, RuleScope, Severity, SettingsMap } from './types';
import { readString } from './utils';
import type { VocabularyProvider } from './vocabulary';

// --------------------------
// Types
// --------------------------
export interface RuleConfig {
  settings: SettingsMap; // merged rule + column + override settings
  vocabulary: VocabularyProvider | null;
}

export interface Rule {
  readonly id: string; // namespace.name
  readonly name: string;
  readonly defaultSeverity: Severity;
  readonly scope: RuleScope;
  /** Must not mutate the dataset. Ordinary bad data yields issues, never throws. */
  check(dataset: Dataset, column: string | null, config: RuleConfig): Issue[];
}

export interface RuleContext extends RuleConfig {
  severity: Severity;
  flag(init: Omit<IssueInit, 'ruleId' | 'severity'>): Issue;
}

export interface ColumnRuleDefinition {
  id: string;
  name: string;
  defaultSeverity: Severity;
  scope: 'column';
  run(dataset: Dataset, column: string, ctx: RuleContext): Issue[];
}

export interface TableRuleDefinition {
  id: string;
  name: string;
  defaultSeverity: Severity;
  scope: 'table';
  run(dataset: Dataset, ctx: RuleContext): Issue[];
}

export type RuleDefinition = ColumnRuleDefinition | TableRuleDefinition;

// --------------------------
// defineRule
// --------------------------
export function resolveSeverity(settings: SettingsMap, fallback: Severity): Severity {
  const s = readString(settings, 'severity');
  return isSeverity(s) ? s : fallback;
}

export function defineRule(def: RuleDefinition): Rule {
  const context = (config: RuleConfig): RuleContext => {
    const severity = resolveSeverity(config.settings, def.defaultSeverity);
    return {
      ...config,
      severity,
      flag: (init) => createIssue({ ...init, ruleId: def.id, severity }),
    };
  };

  return {
    id: def.id,
    name: def.name,
    defaultSeverity: def.defaultSeverity,
    scope: def.scope,
    check(dataset, column, config) {
      if (def.scope === 'table') return def.run(dataset, context(config));
      if (column === null || !dataset.hasColumn(column)) return [];
      return def.run(dataset, column, context(config));
    },
  };
}

// --------------------------
// Registry
// --------------------------
export class RuleRegistry {
  private readonly byId = new Map<string, Rule>();

  register(rule: Rule): this {
    if (this.byId.has(rule.id)) throw new Error(`Rule already registered: ${rule.id}`);
    this.byId.set(rule.id, rule);
    return this;
  }

  get(id: string): Rule | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.byId.size;
  }

  ids(): string[] {
    return [...this.byId.keys()].sort();
  }

  rules(): Rule[] {
    return this.ids().map((id) => this.byId.get(id)).filter((r): r is Rule => r !== undefined);
  }
}

export function createRegistry(rules: Iterable<Rule> = []): RuleRegistry {
  const registry = new RuleRegistry();
  for (const r of rules) registry.register(r);
  return registry;
}
