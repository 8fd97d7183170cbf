import { beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import * as logger from 'firebase-functions/logger';
import { createRegistry } from '../lib/rule-registry';
import { builtinRules } from '../lib/rules';
import { TemplateManager } from '../lib/template-manager';
import type { SettingsMap } from '../lib/types';
import { tmpDir } from './helpers';

vi.mock('firebase-functions/logger', () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

function writeJson(dir: string, file: string, doc: SettingsMap | string): void {
  mkdirSync(dir, { recursive: true });
  writeFileSync(path.join(dir, file), typeof doc === 'string' ? doc : JSON.stringify(doc), 'utf8');
}

describe('TemplateManager', () => {
  let builtinDir: string;
  let userDir: string;
  let projectDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    const root = tmpDir('templates-');
    builtinDir = path.join(root, 'builtin');
    userDir = path.join(root, 'user');
    projectDir = path.join(root, 'project');
    writeJson(builtinDir, 'base.json', { id: 'base', name: 'Base', type: 'generic', columns: { '*': { a: 1, tags: ['x'] } } });
    writeJson(builtinDir, 'extra.json', { id: 'extra', type: 'overlay', columns: { '*': { b: 2, tags: ['y'] }, title: { required: true } } });
    writeJson(builtinDir, 'broken.json', '{ not json');
    writeJson(userDir, 'base.json', { id: 'base', name: 'Mine', columns: { '*': { a: 5 } } });
  });

  it('lists builtin, then user, then project templates and skips unreadable files', () => {
    writeJson(path.join(projectDir, 'templates'), 'local.json', { name: 'Local' });
    const tm = new TemplateManager({ builtinDir, userDir, projectDir });
    const listed = tm.listTemplates().map((t) => `${t.scope}:${t.id}`);
    expect(listed).toEqual(['builtin:base', 'builtin:extra', 'user:base', 'project:local']);
    expect(tm.listTemplates('overlay').map((t) => t.id)).toEqual(['extra']);
    expect(logger.warn).toHaveBeenCalledWith('Could not read template', expect.objectContaining({ file: path.join(builtinDir, 'broken.json') }));
  });

  it('resolves ids with project > user > builtin priority', () => {
    const tm = new TemplateManager({ builtinDir, userDir, projectDir });
    expect(tm.resolvePath('base')).toBe(path.join(userDir, 'base.json'));
    writeJson(path.join(projectDir, 'templates'), 'base.json', { id: 'base' });
    expect(tm.resolvePath('base')).toBe(path.join(projectDir, 'templates', 'base.json'));
    expect(tm.resolvePath('extra')).toBe(path.join(builtinDir, 'extra.json'));
    expect(tm.resolvePath('missing')).toBeNull();
  });

  it('falls back to a declared id when no file carries the name', () => {
    writeJson(userDir, 'renamed.json', { id: 'declared' });
    const tm = new TemplateManager({ builtinDir, userDir });
    expect(tm.resolvePath('declared')).toBe(path.join(userDir, 'renamed.json'));
  });

  it('deep-merges the overlay before resolving columns', () => {
    const tm = new TemplateManager({ builtinDir, userDir: path.join(userDir, 'none') });
    const config = tm.compileConfig('base', 'extra', ['title', 'body']);
    expect(config.columns.title.settings).toEqual({ a: 1, b: 2, tags: ['y'], required: true });
    expect(config.columns.body.settings).toEqual({ a: 1, b: 2, tags: ['y'] });
  });

  it('uses an empty config for a missing base and ignores a missing overlay', () => {
    const tm = new TemplateManager({ builtinDir, userDir });
    const empty = tm.compileConfig('nowhere', null, ['a']);
    expect(empty.columns).toEqual({});
    expect(logger.warn).toHaveBeenCalledWith('Template not found, using empty config', { templateId: 'nowhere' });

    const config = tm.compileConfig('base', 'nowhere', ['a']);
    expect(config.columns.a.settings).toEqual({ a: 5 });
    expect(logger.warn).toHaveBeenCalledWith('Overlay not found, ignoring', { templateId: 'nowhere' });
  });
});

describe('bundled templates', () => {
  it('ships two generic templates and the repository overlay', () => {
    const tm = new TemplateManager({ userDir: tmpDir('user-') });
    expect(tm.listTemplates().map((t) => `${t.id}:${t.type}:${t.readonly}`)).toEqual([
      'generic_default:generic:true',
      'generic_strict:generic:true',
      'vocab_baseline:overlay:true',
    ]);
  });

  it('gates vocabulary rules per column through the overlay', () => {
    vi.clearAllMocks();
    const registry = createRegistry(builtinRules());
    const tm = new TemplateManager({ userDir: tmpDir('user-'), registry });
    const config = tm.compileConfig('generic_default', 'vocab_baseline', ['title', 'created', 'notes']);

    expect(logger.warn).not.toHaveBeenCalled();
    expect(config.rules['vocab.created_format']).toEqual({ enabled: true });
    expect(config.columns.created.ruleOverrides['vocab.created_format']).toEqual({ enabled: true });
    expect(config.columns.created.ruleOverrides['vocab.license']).toEqual({ enabled: false });
    expect(config.columns.title.settings).toEqual({ multiline_ok: false, required: true });
    expect(config.columns.notes.settings).toEqual({ multiline_ok: true });
    expect(config.extras).toEqual({ required_columns: ['title', 'created', 'type', 'license'] });
  });
});
