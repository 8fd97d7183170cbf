import type { CountryCode } from 'libphonenumber-js';
import type { Rule, RuleRegistry } from '../rule-registry';
import { constraintRules } from './constraints';
import { contentTypeRule } from './content-type';
import { duplicateRules } from './duplicates';
import { hygieneRules } from './hygiene';
import { statisticsRules } from './statistics';
import { vocabRules } from './vocab';

export interface BuiltinRuleOptions {
  defaultCountry?: CountryCode; // phone parsing for content_type: phone
}

export function builtinRules(opts: BuiltinRuleOptions = {}): Rule[] {
  return [
    ...hygieneRules,
    ...duplicateRules,
    ...constraintRules,
    contentTypeRule(opts.defaultCountry),
    ...statisticsRules,
    ...vocabRules,
  ];
}

export function registerBuiltinRules(registry: RuleRegistry, opts: BuiltinRuleOptions = {}): RuleRegistry {
  for (const rule of builtinRules(opts)) registry.register(rule);
  return registry;
}

export { DEFAULT_EMPTY_TOKENS, DEFAULT_PSEUDO_MISSING } from './constraints';
export { similarity } from './statistics';
export { vocabularyRule } from './vocab';
