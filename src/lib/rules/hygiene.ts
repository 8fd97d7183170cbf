import { defineRule, type Rule } from '../rule-registry';
import type { Issue } from '../types';
import {
  asciiPunctuation,
  codePointLabel,
  collapseSpaces,
  hasInvisible,
  hasMultipleSpaces,
  joinLines,
  stripInvisible,
  unicodeSuspects,
} from './text';

export const leadingTrailingSpace: Rule = defineRule({
  id: 'generic.hygiene.leading_trailing_space',
  name: 'Leading / trailing whitespace',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null) return;
      const trimmed = v.trim();
      if (trimmed !== v) {
        issues.push(ctx.flag({ row, column, original: v, message: `Leading or trailing whitespace in "${column}"`, suggestion: trimmed }));
      }
    });
    return issues;
  },
});

export const multipleSpaces: Rule = defineRule({
  id: 'generic.hygiene.multiple_spaces',
  name: 'Multiple consecutive spaces',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || !hasMultipleSpaces(v)) return;
      issues.push(
        ctx.flag({ row, column, original: v, message: `Multiple consecutive spaces in "${column}"`, suggestion: collapseSpaces(v) })
      );
    });
    return issues;
  },
});

export const unicodeChars: Rule = defineRule({
  id: 'generic.hygiene.unicode_chars',
  name: 'Typographic Unicode characters',
  defaultSeverity: 'SUSPICION',
  scope: 'column',
  run(dataset, column, ctx) {
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null) return;
      const found = unicodeSuspects(v);
      if (found.length === 0) return;
      issues.push(
        ctx.flag({
          row,
          column,
          original: v,
          message: `Non-standard character(s) in "${column}": ${found.map(codePointLabel).join(', ')}`,
          suggestion: asciiPunctuation(v),
          extra: { codePoints: found.map(codePointLabel) },
        })
      );
    });
    return issues;
  },
});

export const invisibleChars: Rule = defineRule({
  id: 'generic.hygiene.invisible_chars',
  name: 'Invisible / zero-width characters',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || !hasInvisible(v)) return;
      issues.push(
        ctx.flag({ row, column, original: v, message: `Invisible character(s) in "${column}"`, suggestion: stripInvisible(v) })
      );
    });
    return issues;
  },
});

// Newlines are fine in long free-text columns, which opt out with multiline_ok.
export const unexpectedMultiline: Rule = defineRule({
  id: 'generic.unexpected_multiline',
  name: 'Unexpected multiline cell',
  defaultSeverity: 'WARNING',
  scope: 'column',
  run(dataset, column, ctx) {
    if (ctx.settings.multiline_ok === true) return [];
    const issues: Issue[] = [];
    dataset.column(column).forEach((v, row) => {
      if (v === null || !/[\r\n]/.test(v)) return;
      issues.push(ctx.flag({ row, column, original: v, message: `Unexpected line break in "${column}"`, suggestion: joinLines(v) }));
    });
    return issues;
  },
});

export const hygieneRules: Rule[] = [leadingTrailingSpace, multipleSpaces, unicodeChars, invisibleChars, unexpectedMultiline];
