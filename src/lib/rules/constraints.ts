/*
  Declarative per-column constraints. Each rule stays dormant until its
  setting is present in the column's merged config:
    required, allowed_values (+ list_separator), expected_case,
    forbidden_chars, min_length / max_length, list_separator, regex.
  pseudo_missing is the exception and always runs.
*/

import * as logger from 'firebase-functions/logger';
import { defineRule, type Rule } from '../rule-registry';
import type { Issue } from '../types';
import { errorMessage, readBoolean, readNumber, readString, readStringList } from '../utils';
import { codePointLabel, hasLetter, toTitleCase } from './text';

export const DEFAULT_EMPTY_TOKENS = ['', 'NA', 'N/A', 'n/a', 'null', 'NULL', 'None', '-', '.', '?', '#N/A', '#REF!', '#VALEUR!'];
export const DEFAULT_PSEUDO_MISSING = ['NA', 'N/A', 'NULL', 'null', 'n/a', 'na', '-', '?', 'none', 'None', '#N/A'];

const CHAR_NAMES: Record<string, string> = {
  '\t': 'tab',
  '\n': 'line feed',
  '\r': 'carriage return',
  ';': 'semicolon',
  '|': 'vertical bar',
  '"': 'double quote',
  "'": 'apostrophe',
};

function charLabel(ch: string): string {
  if (CHAR_NAMES[ch]) return CHAR_NAMES[ch];
  return /[\p{L}\p{N}\p{P}\p{S}]/u.test(ch) ? ch : codePointLabel(ch);
}

function splitItems(cell: string, sep: string, trim: boolean): string[] {
  const items = cell.split(sep);
  return trim ? items.map((i) => i.trim()) : items;
}

/** Compile a user pattern anchored at both ends, or null (logged) when invalid. */
export function fullMatchPattern(pattern: string, ruleId: string, column: string): RegExp | null {
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (e) {
    logger.warn('Invalid regex in column config, rule skipped', { ruleId, column, pattern, error: errorMessage(e) });
    return null;
  }
}

export const required: Rule = defineRule({
  id: 'generic.required',
  name: 'Required value',
  defaultSeverity: 'ERROR',
  scope: 'column',
  run(dataset, column, ctx) {
    if (ctx.settings.required !== true) return [];
    const emptyTokens = new Set(readStringList(ctx.settings, 'empty_tokens') ?? DEFAULT_EMPTY_TOKENS);
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') {
        issues.push(ctx.flag({ row, column, original: v, message: 'Required value is missing' }));
      } else if (emptyTokens.has(v)) {
        issues.push(ctx.flag({ row, column, original: v, message: `Required value is missing ("${v}" counts as empty)` }));
      }
    });
    return issues;
  },
});

export const allowedValues: Rule = defineRule({
  id: 'generic.allowed_values',
  name: 'Value outside allowed list',
  defaultSeverity: 'ERROR',
  scope: 'column',
  run(dataset, column, ctx) {
    const allowed = readStringList(ctx.settings, 'allowed_values') ?? [];
    if (allowed.length === 0) return [];
    const allowedSet = new Set(allowed);
    const sep = readString(ctx.settings, 'list_separator');
    const trim = readBoolean(ctx.settings, 'list_trim', true);
    const issues: Issue[] = [];

    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      if (!sep) {
        if (!allowedSet.has(v)) {
          issues.push(ctx.flag({ row, column, original: v, message: `Value "${v}" is not allowed in "${column}"` }));
        }
        return;
      }
      const bad = splitItems(v, sep, trim).filter((item) => item !== '' && !allowedSet.has(item));
      if (bad.length > 0) {
        issues.push(
          ctx.flag({
            row,
            column,
            original: v,
            message: `List item(s) not allowed: ${bad.map((b) => `"${b}"`).join(', ')}`,
            extra: { items: bad },
          })
        );
      }
    });
    return issues;
  },
});

export const expectedCase: Rule = defineRule({
  id: 'generic.case',
  name: 'Expected letter case',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const mode = readString(ctx.settings, 'expected_case');
    if (!mode) return [];
    if (mode !== 'upper' && mode !== 'lower' && mode !== 'title') {
      logger.warn('Unknown expected_case, rule skipped', { column, expectedCase: mode });
      return [];
    }
    const convert = mode === 'upper' ? (s: string) => s.toUpperCase() : mode === 'lower' ? (s: string) => s.toLowerCase() : toTitleCase;
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '' || !hasLetter(v)) return;
      const expected = convert(v);
      if (expected !== v) {
        issues.push(ctx.flag({ row, column, original: v, message: `Expected ${mode} case`, suggestion: expected }));
      }
    });
    return issues;
  },
});

export const forbiddenChars: Rule = defineRule({
  id: 'generic.forbidden_chars',
  name: 'Forbidden characters',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const forbidden = readString(ctx.settings, 'forbidden_chars');
    if (!forbidden) return [];
    const chars = [...new Set(forbidden)].sort();
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      const found = chars.filter((ch) => v.includes(ch));
      if (found.length === 0) return;
      issues.push(
        ctx.flag({ row, column, original: v, message: `Forbidden character(s): ${found.map(charLabel).join(', ')}`, extra: { chars: found } })
      );
    });
    return issues;
  },
});

export const valueLength: Rule = defineRule({
  id: 'generic.length',
  name: 'Value length',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const min = readNumber(ctx.settings, 'min_length');
    const max = readNumber(ctx.settings, 'max_length');
    if (min === undefined && max === undefined) return [];
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      const n = [...v].length;
      if (min !== undefined && n < min) {
        issues.push(ctx.flag({ row, column, original: v, message: `Too short (${n} characters, minimum ${min})`, extra: { length: n } }));
      } else if (max !== undefined && n > max) {
        issues.push(ctx.flag({ row, column, original: v, message: `Too long (${n} characters, maximum ${max})`, extra: { length: n } }));
      }
    });
    return issues;
  },
});

export const listItems: Rule = defineRule({
  id: 'generic.list_items',
  name: 'List items',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const sep = readString(ctx.settings, 'list_separator');
    if (!sep) return [];
    const trim = readBoolean(ctx.settings, 'list_trim', true);
    const noEmpty = readBoolean(ctx.settings, 'list_no_empty', true);
    const unique = readBoolean(ctx.settings, 'list_unique', false);
    const minItems = readNumber(ctx.settings, 'list_min_items');
    const maxItems = readNumber(ctx.settings, 'list_max_items');
    const issues: Issue[] = [];

    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      const items = splitItems(v, sep, trim);
      // one finding per cell; the first structural problem wins
      const problems: string[] = [];
      if (noEmpty && items.some((i) => i === '')) {
        problems.push(`Empty list item (check for repeated "${sep}")`);
      } else {
        if (minItems !== undefined && items.length < minItems) problems.push(`Too few items (${items.length}/${minItems} minimum)`);
        if (maxItems !== undefined && items.length > maxItems) problems.push(`Too many items (${items.length}/${maxItems} maximum)`);
        if (unique) {
          const dupes = [...new Set(items.filter((item, i) => items.indexOf(item) !== i))].sort();
          if (dupes.length > 0) problems.push(`Repeated item(s): ${dupes.map((d) => `"${d}"`).join(', ')}`);
        }
      }
      if (problems.length > 0) {
        issues.push(ctx.flag({ row, column, original: v, message: problems.join('; '), extra: { itemCount: items.length } }));
      }
    });
    return issues;
  },
});

export const regex: Rule = defineRule({
  id: 'generic.regex',
  name: 'Format (regular expression)',
  defaultSeverity: 'ERROR',
  scope: 'column',
  run(dataset, column, ctx) {
    const pattern = readString(ctx.settings, 'regex');
    if (!pattern) return [];
    const re = fullMatchPattern(pattern, 'generic.regex', column);
    if (!re) return [];
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      if (!re.test(v)) {
        issues.push(ctx.flag({ row, column, original: v, message: `"${v}" does not match the expected format (${pattern})` }));
      }
    });
    return issues;
  },
});

export const pseudoMissing: Rule = defineRule({
  id: 'generic.pseudo_missing',
  name: 'Pseudo-missing value',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const tokens = new Set(readStringList(ctx.settings, 'tokens') ?? DEFAULT_PSEUDO_MISSING);
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null) return;
      const t = v.trim();
      if (tokens.has(t)) {
        issues.push(ctx.flag({ row, column, original: v, message: `"${t}" stands for a missing value; leave the cell empty instead` }));
      }
    });
    return issues;
  },
});

export const constraintRules: Rule[] = [required, allowedValues, expectedCase, forbiddenChars, valueLength, listItems, regex, pseudoMissing];
