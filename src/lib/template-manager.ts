/*
  Template library
  ----------------
  Scopes, highest priority first when resolving an id:
    project  <projectDir>/templates/*.json
    user     TEMPLATES_USER_DIR (or the platform config dir)
    builtin  src/rulesets/*.json (read-only)
*/

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as logger from 'firebase-functions/logger';
import type { RuleRegistry } from './rule-registry';
import { compileTemplate, deepMerge, parseSettingsMap, parseTemplate, type CompiledConfig } from './template';
import type { SettingsMap, TemplateInfo, TemplateScope, TemplateType } from './types';
import { errorMessage, readString } from './utils';
import type { VocabularyProvider } from './vocabulary';

export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL('../rulesets', import.meta.url));

export interface TemplateManagerOptions {
  userDir: string;
  projectDir?: string | null;
  builtinDir?: string;
  registry?: RuleRegistry;
}

export function readTemplateFile(file: string): SettingsMap | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (e) {
    logger.warn('Could not read template', { file, error: errorMessage(e) });
    return null;
  }
  const map = parseSettingsMap(raw);
  if (!map) logger.warn('Template is not a JSON object', { file });
  return map;
}

export class TemplateManager {
  private readonly builtinDir: string;
  private readonly userDir: string;
  private readonly projectDir: string | null;
  private readonly registry?: RuleRegistry;

  constructor(opts: TemplateManagerOptions) {
    this.builtinDir = opts.builtinDir ?? BUILTIN_TEMPLATES_DIR;
    this.userDir = opts.userDir;
    this.projectDir = opts.projectDir ?? null;
    this.registry = opts.registry;
  }

  private scopes(): Array<{ scope: TemplateScope; dir: string; readonly: boolean }> {
    const out: Array<{ scope: TemplateScope; dir: string; readonly: boolean }> = [];
    if (this.projectDir) out.push({ scope: 'project', dir: path.join(this.projectDir, 'templates'), readonly: false });
    out.push({ scope: 'user', dir: this.userDir, readonly: false });
    out.push({ scope: 'builtin', dir: this.builtinDir, readonly: true });
    return out;
  }

  /** Every parsable template, builtin first, then user, then project. */
  listTemplates(typeFilter?: TemplateType): TemplateInfo[] {
    const found: TemplateInfo[] = [];
    for (const { scope, dir, readonly } of [...this.scopes()].reverse()) {
      if (!existsSync(dir)) continue;
      const files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();
      for (const f of files) {
        const file = path.join(dir, f);
        const doc = readTemplateFile(file);
        if (!doc) continue;
        const id = readString(doc, 'id') || path.basename(f, '.json');
        const type: TemplateType = readString(doc, 'type') === 'overlay' ? 'overlay' : 'generic';
        found.push({ id, name: readString(doc, 'name') || id, scope, type, path: file, readonly });
      }
    }
    return typeFilter ? found.filter((t) => t.type === typeFilter) : found;
  }

  /** Priority project > user > builtin; `<id>.json` first, then a declared id. */
  resolvePath(templateId: string): string | null {
    for (const { dir } of this.scopes()) {
      const file = path.join(dir, `${templateId}.json`);
      if (existsSync(file)) return file;
    }
    const declared = this.listTemplates().filter((t) => t.id === templateId);
    return declared.length > 0 ? declared[declared.length - 1].path : null;
  }

  loadTemplate(templateId: string): SettingsMap | null {
    const file = this.resolvePath(templateId);
    return file ? readTemplateFile(file) : null;
  }

  compileConfig(
    baseId: string,
    overlayId: string | null | undefined,
    columnNames: readonly string[],
    vocabulary?: VocabularyProvider
  ): CompiledConfig {
    const base = this.loadTemplate(baseId);
    if (!base) logger.warn('Template not found, using empty config', { templateId: baseId });

    let overlay: SettingsMap | null = null;
    if (overlayId) {
      overlay = this.loadTemplate(overlayId);
      if (!overlay) logger.warn('Overlay not found, ignoring', { templateId: overlayId });
    }

    const merged = overlay ? deepMerge(base ?? {}, overlay) : base;
    const doc = merged ? parseTemplate(merged, baseId) : null;
    return compileTemplate(doc, columnNames, this.registry, vocabulary);
  }
}
