/*
  Validation engine
  -----------------
  Runs registered rules over a Dataset under a compiled config.
  - full run (columns = null): column rules on every column, table rules once
  - partial run (columns = [...]): column rules on those columns only; table
    rules are skipped so their findings on untouched rows survive
  - per (rule, column) settings = rules[id] < column settings < rule_overrides[id];
    `enabled: false` in any layer skips the pair
  - a rule that throws is logged and contributes no issues

  Usage:
    const engine = new ValidationEngine(registry);
    const issues = engine.validate(dataset, null, config);
*/

import * as logger from 'firebase-functions/logger';
import type { Dataset } from './dataset';
import type { Rule, RuleRegistry } from './rule-registry';
import type { CompiledConfig } from './template';
import type { Issue, SettingsMap } from './types';
import { errorMessage, ownValue } from './utils';
import type { VocabularyProvider } from './vocabulary';

function withoutEnabled(settings: SettingsMap): SettingsMap {
  const { enabled: _enabled, ...rest } = settings;
  return rest;
}

export interface EffectiveSettings {
  enabled: boolean;
  settings: SettingsMap;
}

/** Merged settings for one rule on one column (column = null for table rules). */
export function effectiveSettings(config: CompiledConfig, ruleId: string, column: string | null): EffectiveSettings {
  const ruleLayer = ownValue(config.rules, ruleId) ?? {};
  if (column === null) {
    return { enabled: ruleLayer.enabled !== false, settings: withoutEnabled(ruleLayer) };
  }
  const col = ownValue(config.columns, column);
  const colLayer = col?.settings ?? {};
  const overrideLayer = (col && ownValue(col.ruleOverrides, ruleId)) ?? {};
  const enabled = [ruleLayer, colLayer, overrideLayer].every((l) => l.enabled !== false);
  return {
    enabled,
    settings: withoutEnabled({ ...ruleLayer, ...colLayer, ...overrideLayer }),
  };
}

export class ValidationEngine {
  constructor(private readonly registry: RuleRegistry) {}

  validate(dataset: Dataset, columns: readonly string[] | null, config: CompiledConfig): Issue[] {
    const targets = columns ?? dataset.columns;
    const vocabulary = config.vocabulary ?? null;
    const issues: Issue[] = [];

    for (const rule of this.registry.rules()) {
      if (rule.scope === 'table') {
        if (columns !== null) continue;
        const eff = effectiveSettings(config, rule.id, null);
        if (eff.enabled) issues.push(...this.run(rule, dataset, null, eff.settings, vocabulary));
        continue;
      }
      for (const column of targets) {
        if (!dataset.hasColumn(column)) continue;
        const eff = effectiveSettings(config, rule.id, column);
        if (!eff.enabled) continue;
        issues.push(...this.run(rule, dataset, column, eff.settings, vocabulary));
      }
    }
    logger.debug('Validation finished', { columns: columns ?? 'all', issues: issues.length, vocabulary: vocabulary !== null });
    return issues;
  }

  private run(rule: Rule, dataset: Dataset, column: string | null, settings: SettingsMap, vocabulary: VocabularyProvider | null): Issue[] {
    try {
      return rule.check(dataset, column, { settings, vocabulary });
    } catch (e) {
      logger.error('Rule failed', { ruleId: rule.id, column, error: errorMessage(e) });
      return [];
    }
  }
}
