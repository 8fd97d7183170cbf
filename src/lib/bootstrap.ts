/*
  Startup wiring
  --------------
  bootstrap() loads .env, reads settings, builds the rule registry and the
  engine once, and hands out template managers and review sessions.

  Usage (sketch):
    const app = bootstrap();
    await app.prefetchVocabulary();
    const { session } = app.openFile('input.csv', { overlay: 'vocab_baseline', projectDir: './proj' });
    await session.validateAll();
*/

import { config as loadDotenv } from 'dotenv';
import * as logger from 'firebase-functions/logger';
import { loadDataset, type LoadOptions } from './dataset-loader';
import type { Dataset } from './dataset';
import { ProjectFolder, type ProjectStore } from './project';
import { createRegistry, type RuleRegistry } from './rule-registry';
import { registerBuiltinRules } from './rules';
import { ValidationEngine } from './rules-engine';
import { ReviewSession } from './session';
import { loadSettings, type Settings } from './settings';
import type { CompiledConfig } from './template';
import { TemplateManager } from './template-manager';
import type { DatasetMeta } from './types';
import { RemoteVocabularyClient, StaticVocabulary, type VocabularyProvider } from './vocabulary';

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  dotenv?: boolean; // default true
  vocabulary?: VocabularyProvider; // replaces the remote client (tests, offline use)
}

export interface OpenOptions extends LoadOptions {
  template?: string;
  overlay?: string | null;
  projectDir?: string | null;
}

export interface OpenedFile {
  session: ReviewSession;
  meta: DatasetMeta;
  config: CompiledConfig;
}

export interface App {
  settings: Settings;
  registry: RuleRegistry;
  engine: ValidationEngine;
  vocabulary: VocabularyProvider;
  /** No-op when a static provider was injected. */
  prefetchVocabulary(opts?: { refresh?: boolean }): Promise<void>;
  templates(projectDir?: string | null): TemplateManager;
  compile(dataset: Dataset, opts?: { template?: string; overlay?: string | null; projectDir?: string | null }): CompiledConfig;
  createSession(dataset: Dataset, config: CompiledConfig, project?: ProjectStore): ReviewSession;
  openFile(filePath: string, opts?: OpenOptions): OpenedFile;
}

export function bootstrap(opts: BootstrapOptions = {}): App {
  if (opts.dotenv ?? true) loadDotenv();
  const settings = loadSettings(opts.env ?? process.env);
  const registry = registerBuiltinRules(createRegistry(), { defaultCountry: settings.defaultCountry });
  const engine = new ValidationEngine(registry);
  const remote = opts.vocabulary
    ? null
    : new RemoteVocabularyClient({
        baseUrl: settings.vocabBaseUrl,
        timeoutMs: settings.vocabTimeoutMs,
        cachePath: settings.vocabCachePath,
      });
  const vocabulary: VocabularyProvider = opts.vocabulary ?? remote ?? new StaticVocabulary({});
  logger.info('Bootstrapped', { rules: registry.size, defaultTemplate: settings.defaultTemplate });

  const templates = (projectDir?: string | null) =>
    new TemplateManager({ userDir: settings.userTemplatesDir, projectDir, registry });

  const compile: App['compile'] = (dataset, o = {}) =>
    templates(o.projectDir).compileConfig(o.template ?? settings.defaultTemplate, o.overlay, dataset.columns, vocabulary);

  const createSession: App['createSession'] = (dataset, config, project) =>
    new ReviewSession({ dataset, engine, config, project, historyDepth: settings.historyMaxDepth });

  const openFile: App['openFile'] = (filePath, o = {}) => {
    const project = o.projectDir ? new ProjectFolder(o.projectDir) : undefined;
    const source = project ? project.copyInputFile(filePath) : filePath;
    const { dataset, meta } = loadDataset(source, o);
    const template = o.template ?? settings.defaultTemplate;
    const config = compile(dataset, { template, overlay: o.overlay, projectDir: o.projectDir });
    project?.saveProject(meta, { template, overlay: o.overlay ?? null });
    return { session: createSession(dataset, config, project), meta, config };
  };

  const prefetchVocabulary: App['prefetchVocabulary'] = async (o = {}) => {
    if (remote) await remote.prefetch(o);
  };

  return { settings, registry, engine, vocabulary, prefetchVocabulary, templates, compile, createSession, openFile };
}
