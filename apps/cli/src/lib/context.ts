/**
 * Workspace Context
 *
 * Opens the stores kept in the configuration directory and wires the
 * classification pieces on top of them. Commands build one per invocation.
 */

import {
  ConfigStore,
  JsonLinkStore,
  NotFoundError,
  getDataPaths,
  type DataPaths,
  type Link,
} from '@linkgarden/core';
import {
  FilterEngine,
  FilterNameResolver,
  JsonFilterStore,
  LinkClassifier,
  type LinkFilter,
} from '@linkgarden/classification';
import { ensureDir } from '@linkgarden/utils';
import { config } from '../config/index.js';

export interface WorkspaceContext {
  paths: DataPaths;
  settings: ConfigStore;
  links: JsonLinkStore;
  filters: JsonFilterStore;
  engine: FilterEngine;
  classifier: LinkClassifier;
  filterNames: FilterNameResolver;
}

export function openWorkspace(configDir: string = config.configDir): WorkspaceContext {
  ensureDir(configDir);
  const paths = getDataPaths(configDir);
  const links = new JsonLinkStore(paths.linksFile);
  const filters = new JsonFilterStore(paths.filtersFile);
  const engine = new FilterEngine(filters);

  return {
    paths,
    settings: new ConfigStore(paths.configFile),
    links,
    filters,
    engine,
    classifier: new LinkClassifier(links, engine),
    filterNames: new FilterNameResolver(filters),
  };
}

/**
 * Look up an active link by id or unique id prefix
 */
export function findLink(ctx: WorkspaceContext, idOrPrefix: string): Link {
  const exact = ctx.links.getById(idOrPrefix);
  if (exact && !exact.deleted) {
    return exact;
  }

  const matches = ctx.links.listActive().filter((link) => link.id.startsWith(idOrPrefix));
  const [match] = matches;
  if (matches.length !== 1 || !match) {
    throw new NotFoundError('Link', idOrPrefix);
  }
  return match;
}

/**
 * Look up a filter by numeric id, id or name
 */
export function findFilter(ctx: WorkspaceContext, reference: string): LinkFilter {
  const numericId = /^\d+$/.test(reference) ? Number(reference) : null;
  const filter =
    (numericId !== null ? ctx.filters.getByNumericId(numericId) : undefined) ??
    ctx.filters.getById(reference) ??
    ctx.filters.list().find((candidate) => candidate.name === reference);

  if (!filter) {
    throw new NotFoundError('Filter', reference);
  }
  return filter;
}
