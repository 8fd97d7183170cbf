/*
  Column-statistics rules. They look at the distribution of a column instead
  of one cell at a time, so their findings are SUSPICION by default.
*/

import levenshtein from 'js-levenshtein';
import { defineRule, type Rule } from '../rule-registry';
import type { Issue } from '../types';
import { readNumber } from '../utils';

const LARGE_DISTINCT = 500;
const RARE_COUNT = 3;

function frequencies(values: Iterable<string>): Map<string, number> {
  const freq = new Map<string, number>();
  for (const v of values) freq.set(v, (freq.get(v) ?? 0) + 1);
  return freq;
}

/** 0..100, 100 for identical strings. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 100;
  return Math.floor(100 * (1 - levenshtein(a, b) / longest));
}

// --------------------------
// rare_values
// --------------------------
export const rareValues: Rule = defineRule({
  id: 'generic.rare_values',
  name: 'Rare value in categorical column',
  defaultSeverity: 'SUSPICION',
  scope: 'column',
  run(dataset, column, ctx) {
    const maxDistinct = readNumber(ctx.settings, 'max_distinct') ?? 50;
    const maxRatio = readNumber(ctx.settings, 'max_ratio') ?? 0.2;
    const values = dataset.column(column);
    const nonEmpty = values.filter((v): v is string => v !== null && v.trim() !== '');
    if (nonEmpty.length === 0) return [];

    const freq = frequencies(nonEmpty);
    // only columns that look categorical
    if (freq.size > maxDistinct || freq.size / nonEmpty.length > maxRatio) return [];

    const issues: Issue[] = [];
    values.forEach((v, row) => {
      if (v === null || freq.get(v) !== 1) return;
      issues.push(
        ctx.flag({
          row,
          column,
          original: v,
          message: `"${v}" appears only once in categorical column "${column}" (${freq.size} distinct values)`,
          extra: { distinct: freq.size },
        })
      );
    });
    return issues;
  },
});

// --------------------------
// similar_values
// --------------------------
export const similarValues: Rule = defineRule({
  id: 'generic.similar_values',
  name: 'Near-duplicate spellings',
  defaultSeverity: 'SUSPICION',
  scope: 'column',
  run(dataset, column, ctx) {
    if (ctx.settings.detect_similar_values !== true) return [];
    const threshold = readNumber(ctx.settings, 'similar_threshold') ?? 85;
    const minDistinct = readNumber(ctx.settings, 'similar_min_distinct') ?? 5;

    const values = dataset.column(column);
    const trimmed = values.map((v) => (v === null ? '' : v.trim()));
    const freq = frequencies(trimmed.filter((v) => v !== ''));
    const distinct = [...freq.keys()];
    if (distinct.length < minDistinct) return [];

    // large columns: compare only rare values against everything
    const large = distinct.length > LARGE_DISTINCT;
    const candidates = large ? distinct.filter((v) => (freq.get(v) ?? 0) <= RARE_COUNT) : distinct;

    const seen = new Set<string>();
    const flagged = new Map<string, { suggestion: string; score: number }>();
    for (const val of candidates) {
      for (const other of distinct) {
        if (val === other) continue;
        const pairKey = val < other ? `${val}\u0000${other}` : `${other}\u0000${val}`;
        if (seen.has(pairKey)) continue;
        seen.add(pairKey);

        const score = similarity(val, other);
        if (score < threshold) continue;
        const [suggestion, lessFrequent] = (freq.get(val) ?? 0) >= (freq.get(other) ?? 0) ? [val, other] : [other, val];
        const prev = flagged.get(lessFrequent);
        if (!prev || score > prev.score) flagged.set(lessFrequent, { suggestion, score });
      }
    }

    // one finding per flagged value, at its first occurrence
    const issues: Issue[] = [];
    trimmed.forEach((v, row) => {
      const hit = flagged.get(v);
      if (!hit) return;
      flagged.delete(v);
      issues.push(
        ctx.flag({
          row,
          column,
          original: values[row],
          message: `"${v}" is very close to "${hit.suggestion}" (similarity ${hit.score}%)`,
          suggestion: hit.suggestion,
          extra: { score: hit.score },
        })
      );
    });
    return issues;
  },
});

// --------------------------
// soft_typing
// --------------------------
const INT_RE = /^-?\d+$/;
const FLOAT_RE = /^-?\d+[.,]\d+$/;
const DATE_RE = /^(\d{4}[-/]\d{2}[-/]\d{2}|\d{2}[-/]\d{2}[-/]\d{4})$/;

const TYPE_CHECKS: ReadonlyArray<[string, (v: string) => boolean]> = [
  ['integer', (v) => INT_RE.test(v)],
  ['float', (v) => FLOAT_RE.test(v)],
  ['date', (v) => DATE_RE.test(v)],
];

export function dominantType(values: readonly string[], threshold: number): [string, (v: string) => boolean] | null {
  if (values.length === 0) return null;
  for (const entry of TYPE_CHECKS) {
    const matches = values.filter(entry[1]).length;
    if (matches / values.length >= threshold) return entry;
  }
  return null;
}

export const softTyping: Rule = defineRule({
  id: 'generic.soft_typing',
  name: 'Outlier against dominant type',
  defaultSeverity: 'SUSPICION',
  scope: 'column',
  run(dataset, column, ctx) {
    const minCount = readNumber(ctx.settings, 'min_count') ?? 30;
    const threshold = readNumber(ctx.settings, 'threshold') ?? 0.95;
    const values = dataset.column(column);
    const nonEmpty = values.map((v) => (v === null ? '' : v.trim())).filter((v) => v !== '');
    if (nonEmpty.length < minCount) return [];

    const dominant = dominantType(nonEmpty, threshold);
    if (!dominant) return [];
    const [typeName, check] = dominant;

    const issues: Issue[] = [];
    values.forEach((v, row) => {
      if (v === null || v.trim() === '' || check(v.trim())) return;
      issues.push(
        ctx.flag({
          row,
          column,
          original: v,
          message: `"${v.trim()}" does not match the dominant type (${typeName}) of "${column}"`,
          extra: { dominantType: typeName },
        })
      );
    });
    return issues;
  },
});

export const statisticsRules: Rule[] = [rareValues, similarValues, softTyping];
