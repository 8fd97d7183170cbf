import { defineRule, type Rule } from '../rule-registry';
import type { Issue, Severity } from '../types';
import { readString } from '../utils';
import { fullMatchPattern } from './constraints';

// W3C-DTF subset: YYYY, YYYY-MM or YYYY-MM-DD
const CREATED_RE = /^\d{4}(-\d{2}(-\d{2})?)?$/;

export const createdFormat: Rule = defineRule({
  id: 'vocab.created_format',
  name: 'Creation date format (W3C-DTF)',
  defaultSeverity: 'ERROR',
  scope: 'column',
  run(dataset, column, ctx) {
    const custom = readString(ctx.settings, 'regex');
    const re = custom ? fullMatchPattern(custom, 'vocab.created_format', column) : CREATED_RE;
    if (!re) return [];
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || v.trim() === '') return;
      const cell = v.trim();
      if (!re.test(cell)) {
        issues.push(ctx.flag({ row, column, original: v, message: `Invalid date "${cell}": use YYYY, YYYY-MM or YYYY-MM-DD` }));
      }
    });
    return issues;
  },
});

/**
 * Membership in a controlled vocabulary. Reports nothing while the vocabulary
 * is missing or empty, so offline sessions produce no false positives.
 */
export function vocabularyRule(id: string, name: string, vocabulary: string, defaultSeverity: Severity): Rule {
  return defineRule({
    id,
    name,
    defaultSeverity,
    scope: 'column',
    run(dataset, column, ctx) {
      const terms = ctx.vocabulary?.values(vocabulary) ?? [];
      if (terms.length === 0) return [];
      const known = new Set(terms);
      const issues: Issue[] = [];
      dataset.column(column).forEach((v, row) => {
        if (v === null || v.trim() === '') return;
        const cell = v.trim();
        if (!known.has(cell)) {
          issues.push(ctx.flag({ row, column, original: v, message: `"${cell}" is not in the ${vocabulary} vocabulary`, extra: { vocabulary } }));
        }
      });
      return issues;
    },
  });
}

export const depositType = vocabularyRule('vocab.deposit_type', 'Deposit type vocabulary', 'deposit_types', 'ERROR');
export const license = vocabularyRule('vocab.license', 'License vocabulary', 'licenses', 'ERROR');
export const language = vocabularyRule('vocab.language', 'Language code vocabulary', 'languages', 'WARNING');

export const vocabRules: Rule[] = [createdFormat, depositType, license, language];
