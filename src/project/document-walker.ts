// Depth-first traversal over the include forest

import { IdlDocument } from '../types';

/**
 * Yields every document reachable from `roots` exactly once, each after the
 * documents it includes. Include cycles are cut at the first revisit.
 */
export function* depthFirstSearch(roots: Iterable<IdlDocument>): Generator<IdlDocument> {
  const visited = new Set<IdlDocument>();

  function* visit(document: IdlDocument): Generator<IdlDocument> {
    if (visited.has(document)) {
      return;
    }
    visited.add(document);
    for (const include of document.includes) {
      yield* visit(include.document);
    }
    yield document;
  }

  for (const root of roots) {
    yield* visit(root);
  }
}
