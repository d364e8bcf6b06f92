/**
 * Tree-wide usage validation.
 */

import { getDefaultLogger, type Logger } from './observability/logger.js';
import type { ScopeReader } from './scope.js';

export interface TreeCheckOptions {
  logger?: Logger;
}

/**
 * Visits `scope` and every scope below it, parents before children and
 * siblings in name order. `path` is the dot-joined names from `scope`.
 */
export function walkScopes(
  scope: ScopeReader,
  visit: (scope: ScopeReader, path: string) => void,
  path: string = '',
): void {
  visit(scope, path);
  for (const name of scope.listSubscopes()) {
    walkScopes(scope.getSubscope(name), visit, path ? `${path}.${name}` : name);
  }
}

/**
 * Runs `checkAllRead` on every scope of the tree, labelling each option with
 * its dotted path, e.g. `search.cpuct`. Throws on the first unread option.
 */
export function checkTreeAllRead(scope: ScopeReader, options?: TreeCheckOptions): void {
  const logger = options?.logger ?? getDefaultLogger();
  walkScopes(scope, (current, path) => {
    logger.debug('Checking option usage', { path: path || '<root>' });
    current.checkAllRead(path ? `${path}.` : '');
  });
}
