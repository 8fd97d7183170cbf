/*
  Template documents and the config compiler
  ------------------------------------------
  A template is a JSON document:

    {
      "id": "generic_default", "name": "...", "type": "generic" | "overlay",
      "rules":   { "<rule id>": { "enabled": true, "severity": "WARNING", ... } },
      "columns": { "*": {...}, "<column>": { ..., "rule_overrides": { "<rule id>": {...} } } },
      "column_groups": { "<glob>": {...} },
      ...free-form keys kept as extras (e.g. required_columns)
    }

  Per-column settings resolve as wildcard < column_groups (declared order) < exact,
  each layer deep-merged on the previous one.
*/

import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import type { RuleRegistry } from './rule-registry';
import type { SettingValue, SettingsMap, TemplateType } from './types';
import { isSettingsMap, ownValue } from './utils';
import type { VocabularyProvider } from './vocabulary';

// --------------------------
// Schema
// --------------------------
export const JsonValue: z.ZodType<SettingValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValue), z.record(JsonValue)])
);
export const SettingsMapSchema = z.record(JsonValue);

const KNOWN_KEYS = new Set(['id', 'name', 'type', 'description', 'rules', 'columns', 'column_groups']);

const TemplateSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  type: z.enum(['generic', 'overlay']).optional(),
  description: z.string().optional(),
  rules: z.record(SettingsMapSchema).default({}),
  columns: z.record(SettingsMapSchema).default({}),
  column_groups: z.record(SettingsMapSchema).default({}),
});

export interface TemplateDocument {
  id?: string;
  name?: string;
  type: TemplateType;
  description?: string;
  rules: Record<string, SettingsMap>;
  columns: Record<string, SettingsMap>;
  columnGroups: Array<[pattern: string, settings: SettingsMap]>;
  extras: SettingsMap;
}

export interface CompiledColumn {
  settings: SettingsMap; // without rule_overrides
  ruleOverrides: Record<string, SettingsMap>;
}

export interface CompiledConfig {
  rules: Record<string, SettingsMap>;
  columns: Record<string, CompiledColumn>;
  extras: SettingsMap;
  vocabulary?: VocabularyProvider;
}

export const WILDCARD = '*';

export function emptyConfig(): CompiledConfig {
  return { rules: {}, columns: {}, extras: {} };
}

// --------------------------
// Merge
// --------------------------
function cloneValue(v: SettingValue): SettingValue {
  if (Array.isArray(v)) return v.map(cloneValue);
  if (isSettingsMap(v)) return deepMerge({}, v);
  return v;
}

/** Maps merge key by key, recursively; scalars and lists from overlay replace base. */
export function deepMerge(base: SettingsMap, overlay: SettingsMap): SettingsMap {
  const out: SettingsMap = {};
  for (const [k, v] of Object.entries(base)) out[k] = cloneValue(v);
  for (const [k, v] of Object.entries(overlay)) {
    const prev = out[k];
    out[k] = isSettingsMap(prev) && isSettingsMap(v) ? deepMerge(prev, v) : cloneValue(v);
  }
  return out;
}

// --------------------------
// Parsing
// --------------------------
/** Validate raw JSON as a settings map (the shape both base and overlay share before merging). */
export function parseSettingsMap(raw: unknown): SettingsMap | null {
  const res = SettingsMapSchema.safeParse(raw);
  return res.success ? res.data : null;
}

export function parseTemplate(raw: SettingsMap, source = '<memory>'): TemplateDocument | null {
  const res = TemplateSchema.safeParse(raw);
  if (!res.success) {
    logger.warn('Template failed validation, ignoring', { source, issues: res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) });
    return null;
  }
  const extras: SettingsMap = {};
  for (const [k, v] of Object.entries(raw)) if (!KNOWN_KEYS.has(k)) extras[k] = v;
  const doc = res.data;
  return {
    id: doc.id,
    name: doc.name,
    type: doc.type ?? 'generic',
    description: doc.description,
    rules: doc.rules,
    columns: doc.columns,
    columnGroups: Object.entries(doc.column_groups),
    extras,
  };
}

// --------------------------
// Globs
// --------------------------
function escapeRe(ch: string): string {
  return /[\\^$.*+?()[\]{}|/-]/.test(ch) ? `\\${ch}` : ch;
}

/**
 * Whole-name, case-sensitive glob: `*`, `?`, `[abc]`, `[a-z]`, `[!abc]`.
 * Returns null for a pattern that cannot be compiled (e.g. an unclosed class).
 */
export function globToRegExp(pattern: string): RegExp | null {
  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      out += '.*';
      i++;
    } else if (ch === '?') {
      out += '.';
      i++;
    } else if (ch === '[') {
      let j = i + 1;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++; // leading ] is literal
      while (j < pattern.length && pattern[j] !== ']') j++;
      if (j >= pattern.length) return null;
      let body = pattern.slice(i + 1, j);
      let negate = false;
      if (body.startsWith('!')) {
        negate = true;
        body = body.slice(1);
      }
      const cls = body.replace(/[\\^\]]/g, (c) => `\\${c}`);
      out += `[${negate ? '^' : ''}${cls}]`;
      i = j + 1;
    } else {
      out += escapeRe(ch);
      i++;
    }
  }
  try {
    return new RegExp(`^${out}$`, 's');
  } catch {
    return null;
  }
}

// --------------------------
// Column resolution
// --------------------------
export function resolveColumns(doc: TemplateDocument, columnNames: readonly string[]): Record<string, SettingsMap> {
  const wildcard = ownValue(doc.columns, WILDCARD) ?? {};
  const groups: Array<[RegExp, SettingsMap]> = [];
  for (const [pattern, settings] of doc.columnGroups) {
    const re = globToRegExp(pattern);
    if (!re) {
      logger.warn('Invalid column group pattern, group skipped', { pattern });
      continue;
    }
    groups.push([re, settings]);
  }

  const resolved = new Map<string, SettingsMap>();
  for (const col of columnNames) {
    let settings = deepMerge({}, wildcard);
    for (const [re, group] of groups) if (re.test(col)) settings = deepMerge(settings, group);
    const exact = col === WILDCARD ? undefined : ownValue(doc.columns, col);
    if (exact) settings = deepMerge(settings, exact);
    resolved.set(col, settings);
  }
  // fromEntries defines own keys, so a `__proto__` label stays a plain entry
  return Object.fromEntries(resolved);
}

function splitOverrides(settings: SettingsMap): CompiledColumn {
  const { rule_overrides: raw, ...rest } = settings;
  const ruleOverrides: Record<string, SettingsMap> = {};
  if (isSettingsMap(raw)) {
    for (const [ruleId, o] of Object.entries(raw)) if (isSettingsMap(o)) ruleOverrides[ruleId] = o;
  }
  return { settings: rest, ruleOverrides };
}

export function compileTemplate(
  doc: TemplateDocument | null,
  columnNames: readonly string[],
  registry?: RuleRegistry,
  vocabulary?: VocabularyProvider
): CompiledConfig {
  const config = emptyConfig();
  if (doc) {
    if (registry) {
      for (const ruleId of Object.keys(doc.rules)) {
        if (!registry.has(ruleId)) logger.warn('Template references unknown rule', { ruleId });
      }
    }
    config.rules = doc.rules;
    config.extras = doc.extras;
    config.columns = Object.fromEntries(
      Object.entries(resolveColumns(doc, columnNames)).map(([col, settings]) => [col, splitOverrides(settings)])
    );
  }
  if (vocabulary) config.vocabulary = vocabulary;
  return config;
}
