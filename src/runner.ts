import * as path from 'node:path';
import { ArtifactStore, FileArtifactStore } from './artifact-store.js';
import { CloneEngineOptions, cloneEntity } from './clone-engine.js';
import { CloneConfig } from './config.js';
import { IdentifierGenerator, createRandomIdentifierGenerator } from './identifiers.js';
import { RepositoryLayout, resolveRepositoryRoot } from './layout.js';
import { CloneLogger, createConsoleLogger } from './logger.js';
import { CloneReport, CloneRequest } from './types.js';

/**
 * Collaborators a caller may replace; the rest come from configuration.
 */
export interface RunnerOverrides {
  store?: ArtifactStore;
  ids?: IdentifierGenerator;
  logger?: CloneLogger;
}

/**
 * Build engine options for the repository named in configuration.
 */
export function createEngineOptions(config: CloneConfig, overrides: RunnerOverrides = {}): CloneEngineOptions {
  const root = resolveRepositoryRoot(path.resolve(config.repositoryRoot), config.configDir);
  return {
    layout: new RepositoryLayout(root),
    store: overrides.store ?? new FileArtifactStore(),
    ids: overrides.ids ?? createRandomIdentifierGenerator(),
    logger: overrides.logger ?? createConsoleLogger(),
    namespaces: config.namespaces,
    encoding: config.encoding,
    identityAttribute: config.identityAttribute,
    regenerateNestedIdentities: config.regenerateNestedIdentities
  };
}

export function runClone(request: CloneRequest, config: CloneConfig, overrides: RunnerOverrides = {}): CloneReport {
  return cloneEntity(request, createEngineOptions(config, overrides));
}
