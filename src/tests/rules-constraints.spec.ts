import { beforeEach, describe, it, expect, vi } from 'vitest';
import * as logger from 'firebase-functions/logger';
import {
  allowedValues,
  expectedCase,
  forbiddenChars,
  listItems,
  pseudoMissing,
  regex,
  required,
  valueLength,
} from '../lib/rules/constraints';
import { columnOf, rows, runRule } from './helpers';

vi.mock('firebase-functions/logger', () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

beforeEach(() => {
  vi.clearAllMocks();
});

describe('generic.required', () => {
  const data = columnOf([null, '', '  ', 'NA', 'x']);

  it('flags empty cells and empty tokens', () => {
    const issues = runRule(required, data, 'c', { required: true });
    expect(rows(issues)).toEqual([0, 1, 2, 3]);
    expect(issues[0].severity).toBe('ERROR');
  });

  it('uses configured empty tokens', () => {
    expect(rows(runRule(required, data, 'c', { required: true, empty_tokens: ['x'] }))).toEqual([0, 1, 2, 4]);
  });

  it('is dormant without required', () => {
    expect(runRule(required, data, 'c')).toEqual([]);
  });
});

describe('generic.allowed_values', () => {
  it('checks whole cells', () => {
    const issues = runRule(allowedValues, columnOf(['A', 'C', null, ' ']), 'c', { allowed_values: ['A', 'B'] });
    expect(rows(issues)).toEqual([1]);
  });

  it('checks each list item and reports one issue per cell', () => {
    const issues = runRule(allowedValues, columnOf(['A; B', 'A;X;Y', 'A;;B']), 'c', {
      allowed_values: ['A', 'B'],
      list_separator: ';',
    });
    expect(rows(issues)).toEqual([1]);
    expect(issues[0].extra).toEqual({ items: ['X', 'Y'] });
  });
});

describe('generic.case', () => {
  it('suggests the expected case', () => {
    const issues = runRule(expectedCase, columnOf(['ABC', 'abc', '123']), 'c', { expected_case: 'upper' });
    expect(rows(issues)).toEqual([1]);
    expect(issues[0].suggestion).toBe('ABC');
  });

  it('title-cases after any non-letter', () => {
    const [found] = runRule(expectedCase, columnOf(['jean-paul DUPONT']), 'c', { expected_case: 'title' });
    expect(found.suggestion).toBe('Jean-Paul Dupont');
  });

  it('skips an unknown mode with a warning', () => {
    expect(runRule(expectedCase, columnOf(['abc']), 'c', { expected_case: 'camel' })).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Unknown expected_case, rule skipped', { column: 'c', expectedCase: 'camel' });
  });
});

describe('generic.forbidden_chars', () => {
  it('lists the forbidden characters found', () => {
    const issues = runRule(forbiddenChars, columnOf(['a;b|c', 'ok']), 'c', { forbidden_chars: '|;' });
    expect(rows(issues)).toEqual([0]);
    expect(issues[0].extra).toEqual({ chars: [';', '|'] });
    expect(issues[0].message).toBe('Forbidden character(s): semicolon, vertical bar');
  });
});

describe('generic.length', () => {
  it('checks minimum then maximum length', () => {
    const issues = runRule(valueLength, columnOf(['a', 'abcd', 'abcde']), 'c', { min_length: 2, max_length: 4 });
    expect(rows(issues)).toEqual([0, 2]);
    expect(issues.map((i) => i.extra.length)).toEqual([1, 5]);
  });
});

describe('generic.list_items', () => {
  it('reports empty items, repeats and counts', () => {
    const issues = runRule(listItems, columnOf(['a;b', 'a;;b', 'a;b;a', 'a;b;c;d']), 'c', {
      list_separator: ';',
      list_unique: true,
      list_max_items: 3,
    });
    expect(rows(issues)).toEqual([1, 2, 3]);
    expect(issues.map((i) => i.message)).toEqual([
      'Empty list item (check for repeated ";")',
      'Repeated item(s): "a"',
      'Too many items (4/3 maximum)',
    ]);
  });

  it('allows empty items when told to', () => {
    expect(runRule(listItems, columnOf(['a;;b']), 'c', { list_separator: ';', list_no_empty: false })).toEqual([]);
  });
});

describe('generic.regex', () => {
  it('requires a full match', () => {
    const issues = runRule(regex, columnOf(['123', '1234', 'abc', null]), 'c', { regex: '\\d{3}' });
    expect(rows(issues)).toEqual([1, 2]);
  });

  it('skips an invalid pattern with a warning', () => {
    expect(runRule(regex, columnOf(['x']), 'c', { regex: '(' })).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Invalid regex in column config, rule skipped',
      expect.objectContaining({ ruleId: 'generic.regex', column: 'c', pattern: '(' })
    );
  });
});

describe('generic.pseudo_missing', () => {
  it('flags stand-ins for missing values', () => {
    expect(rows(runRule(pseudoMissing, columnOf([' n/a ', 'N/A', 'value', 'none']), 'c'))).toEqual([0, 1, 3]);
  });

  it('uses configured tokens', () => {
    expect(rows(runRule(pseudoMissing, columnOf(['??', 'N/A']), 'c', { tokens: ['??'] }))).toEqual([0]);
  });
});
