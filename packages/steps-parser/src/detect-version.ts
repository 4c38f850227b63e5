/**
 * CFDI schema version detection
 *
 * Walks CFDI_NAMESPACE_CANDIDATES in priority order. A candidate wins when
 * the root element lives in one of its namespaces, or failing that when the
 * root declares one of them. Documents matching nothing are read as the
 * last (oldest) candidate.
 */

import { CFDI_NAMESPACE_CANDIDATES } from './types.js';
import type { CfdiNamespaceCandidate, VersionDetection } from './types.js';
import type { XmlElement } from './xml-tree.js';

export function detectCfdiVersion(
  root: XmlElement,
  candidates: readonly CfdiNamespaceCandidate[] = CFDI_NAMESPACE_CANDIDATES,
): VersionDetection {
  const fallback = candidates[candidates.length - 1];
  if (!fallback) {
    throw new Error('No CFDI namespace candidates configured');
  }

  for (const candidate of candidates) {
    if (candidate.uris.includes(root.namespaceUri)) {
      return { candidate, matchedBy: 'root-namespace', documentNamespaces: new Set(candidate.uris) };
    }
  }

  const declared = [...root.declaredNamespaces.values()];
  for (const candidate of candidates) {
    if (declared.some((uri) => candidate.uris.includes(uri))) {
      return { candidate, matchedBy: 'declared-namespace', documentNamespaces: new Set(candidate.uris) };
    }
  }

  // Unknown namespace: also accept elements in the root's own namespace
  return {
    candidate: fallback,
    matchedBy: 'fallback',
    documentNamespaces: new Set([...fallback.uris, root.namespaceUri]),
  };
}
