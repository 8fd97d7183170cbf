import { beforeEach, describe, it, expect, vi } from 'vitest';
import * as logger from 'firebase-functions/logger';
import { Dataset } from '../lib/dataset';
import { createRegistry, defineRule } from '../lib/rule-registry';
import { registerBuiltinRules } from '../lib/rules';
import { duplicateRows, uniqueColumn } from '../lib/rules/duplicates';
import { leadingTrailingSpace } from '../lib/rules/hygiene';
import { ValidationEngine, effectiveSettings } from '../lib/rules-engine';
import { compileTemplate, emptyConfig, parseTemplate, type CompiledConfig } from '../lib/template';
import { WHOLE_ROW } from '../lib/types';

vi.mock('firebase-functions/logger', () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

beforeEach(() => {
  vi.clearAllMocks();
});

const data = () =>
  new Dataset(
    ['A', 'B'],
    [
      ['x ', 'one'],
      ['y', 'two  words'],
      ['x ', 'one'],
    ]
  );

describe('RuleRegistry', () => {
  it('refuses duplicate ids and lists rules sorted', () => {
    const registry = createRegistry([uniqueColumn, leadingTrailingSpace]);
    expect(() => registry.register(uniqueColumn)).toThrow('Rule already registered: generic.unique_column');
    expect(registry.ids()).toEqual(['generic.hygiene.leading_trailing_space', 'generic.unique_column']);
  });

  it('holds every built-in rule', () => {
    expect(registerBuiltinRules(createRegistry()).size).toBe(23);
  });
});

describe('effectiveSettings', () => {
  const config: CompiledConfig = {
    ...emptyConfig(),
    rules: { r: { enabled: true, severity: 'WARNING', a: 1 } },
    columns: { c: { settings: { a: 2, b: 1 }, ruleOverrides: { r: { b: 2 } } } },
  };

  it('merges rule < column < override without the enabled key', () => {
    expect(effectiveSettings(config, 'r', 'c')).toEqual({ enabled: true, settings: { severity: 'WARNING', a: 2, b: 2 } });
  });

  it('uses the rule layer alone for table rules', () => {
    expect(effectiveSettings(config, 'r', null)).toEqual({ enabled: true, settings: { severity: 'WARNING', a: 1 } });
  });

  it('lets enabled: false in any layer win', () => {
    const off: CompiledConfig = { ...config, columns: { c: { settings: { enabled: false }, ruleOverrides: { r: { enabled: true } } } } };
    expect(effectiveSettings(off, 'r', 'c').enabled).toBe(false);
  });
});

describe('column labels named like object members', () => {
  const trimOnly = new ValidationEngine(createRegistry([leadingTrailingSpace]));
  const ds = () => Dataset.fromColumns({ constructor: ['x '], toString: ['y'], valueOf: [' z'] });
  const found = (issues: ReturnType<typeof trimOnly.validate>) => issues.map((i) => [i.column, i.row]);

  it('validates them under an empty config', () => {
    expect(found(trimOnly.validate(ds(), null, emptyConfig()))).toEqual([
      ['constructor', 0],
      ['valueOf', 0],
    ]);
    expect(found(trimOnly.validate(ds(), null, compileTemplate(null, ds().columns)))).toEqual([
      ['constructor', 0],
      ['valueOf', 0],
    ]);
  });

  it('resolves their settings from the template only', () => {
    const doc = parseTemplate({ columns: { '*': { severity: 'ERROR' }, valueOf: { enabled: false } } });
    const config = compileTemplate(doc, ds().columns);
    expect(effectiveSettings(config, 'r', 'constructor')).toEqual({ enabled: true, settings: { severity: 'ERROR' } });
    expect(effectiveSettings(emptyConfig(), 'hasOwnProperty', 'toString')).toEqual({ enabled: true, settings: {} });
    const issues = trimOnly.validate(ds(), null, config);
    expect(issues.map((i) => [i.column, i.severity])).toEqual([['constructor', 'ERROR']]);
  });
});

describe('ValidationEngine', () => {
  const engine = new ValidationEngine(registerBuiltinRules(createRegistry()));
  const config: CompiledConfig = { ...emptyConfig(), rules: { 'vocab.created_format': { enabled: false } } };

  it('is deterministic', () => {
    const ids = (run: ReturnType<typeof engine.validate>) => run.map((i) => i.id);
    const first = engine.validate(data(), null, config);
    expect(first.length).toBeGreaterThan(0);
    expect(ids(engine.validate(data(), null, config))).toEqual(ids(first));
  });

  it('runs table rules on full runs only', () => {
    const full = engine.validate(data(), null, config);
    expect(full.filter((i) => i.column === WHOLE_ROW).map((i) => i.row)).toEqual([2]);
    const partial = engine.validate(data(), ['A'], config);
    expect(partial.every((i) => i.column === 'A')).toBe(true);
    expect(partial.map((i) => i.row)).toEqual([0, 2]);
  });

  it('skips unknown columns in a partial run', () => {
    expect(engine.validate(data(), ['Z'], config)).toEqual([]);
  });

  it('honours enabled at rule, column and override level', () => {
    const small = new ValidationEngine(createRegistry([leadingTrailingSpace, duplicateRows]));
    const ruleOff: CompiledConfig = { ...emptyConfig(), rules: { 'generic.duplicate_rows': { enabled: false } } };
    expect(small.validate(data(), null, ruleOff).map((i) => i.ruleId)).toEqual([
      'generic.hygiene.leading_trailing_space',
      'generic.hygiene.leading_trailing_space',
    ]);

    const columnOff: CompiledConfig = { ...emptyConfig(), columns: { A: { settings: { enabled: false }, ruleOverrides: {} } } };
    expect(small.validate(data(), ['A'], columnOff)).toEqual([]);

    const overrideOff: CompiledConfig = {
      ...emptyConfig(),
      columns: { A: { settings: {}, ruleOverrides: { 'generic.hygiene.leading_trailing_space': { enabled: false } } } },
    };
    expect(small.validate(data(), ['A'], overrideOff)).toEqual([]);
  });

  it('contains a failing rule', () => {
    const boom = defineRule({
      id: 'test.boom',
      name: 'Boom',
      defaultSeverity: 'ERROR',
      scope: 'column',
      run() {
        throw new Error('boom');
      },
    });
    const mixed = new ValidationEngine(createRegistry([boom, leadingTrailingSpace]));
    const issues = mixed.validate(data(), ['A'], emptyConfig());
    expect(issues.map((i) => i.row)).toEqual([0, 2]);
    expect(logger.error).toHaveBeenCalledWith('Rule failed', { ruleId: 'test.boom', column: 'A', error: 'boom' });
  });

  it('flags the repeat in a unique column', () => {
    const unique = new ValidationEngine(createRegistry([uniqueColumn]));
    const cfg: CompiledConfig = { ...emptyConfig(), columns: { Code: { settings: { unique: true }, ruleOverrides: {} } } };
    const issues = unique.validate(Dataset.fromColumns({ Code: ['a', 'b', 'a'] }), null, cfg);
    expect(issues.map((i) => [i.row, i.severity])).toEqual([[2, 'ERROR']]);
  });
});
