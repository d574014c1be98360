import { DEFAULT_IDENTIFIER_RULES, type IdentifierRules } from '../config.js';
import { describeCause, NoDocumentsLoadedError } from '../errors.js';
import { trackedSlots, VIEW_LAYOUTS } from './rules.js';
import {
  VIEW_KINDS,
  type Inconsistency,
  type NameUniverse,
  type UnavailableView,
  type ViewDocuments,
  type ViewExtraction,
  type ViewKind
} from './types.js';

export function extractView(
  kind: ViewKind,
  document: unknown,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): ViewExtraction {
  const occurrences = trackedSlots(VIEW_LAYOUTS[kind], document, rules).map((slot) => ({
    name: slot.name,
    index: slot.index,
    path: slot.path
  }));

  const counts = new Map<string, number>();
  for (const occurrence of occurrences) {
    counts.set(occurrence.name, (counts.get(occurrence.name) ?? 0) + 1);
  }

  return { kind, occurrences, counts };
}

/**
 * Builds the name universe from whichever views loaded. A view that is
 * unavailable, or whose shape is unexpected, is recorded rather than thrown;
 * only when no view is usable does this fail.
 */
export function extract(
  documents: ViewDocuments,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): NameUniverse {
  const views: NameUniverse['views'] = {};
  const unavailable: UnavailableView[] = [];

  for (const kind of VIEW_KINDS) {
    const view = documents[kind];
    if (view.status === 'unavailable') {
      unavailable.push({ kind, reason: view.reason });
      continue;
    }
    try {
      views[kind] = extractView(kind, view.data, rules);
    } catch (error) {
      unavailable.push({ kind, reason: describeCause(error) });
    }
  }

  if (unavailable.length === VIEW_KINDS.length) {
    const reasons: Partial<Record<ViewKind, string>> = {};
    for (const entry of unavailable) reasons[entry.kind] = entry.reason;
    throw new NoDocumentsLoadedError(reasons);
  }

  const names = new Set<string>();
  for (const kind of VIEW_KINDS) {
    for (const name of views[kind]?.counts.keys() ?? []) names.add(name);
  }

  return { views, names: [...names].sort(), unavailable };
}

export function loadedKinds(universe: NameUniverse): ViewKind[] {
  return VIEW_KINDS.filter((kind) => universe.views[kind] !== undefined);
}

export function countIn(universe: NameUniverse, kind: ViewKind, name: string): number {
  return universe.views[kind]?.counts.get(name) ?? 0;
}

/**
 * Advisory report of how the views disagree. Views that did not load are
 * reported once and left out of the comparisons.
 */
export function diagnose(universe: NameUniverse): Inconsistency[] {
  const issues = universe.unavailable.map((entry): Inconsistency => ({
    type: 'document-unavailable',
    view: entry.kind,
    reason: entry.reason
  }));
  const kinds = loadedKinds(universe);

  for (const kind of kinds) {
    for (const [name, count] of universe.views[kind]?.counts ?? []) {
      if (count > 1) {
        issues.push({ type: 'intra-view-duplication', name, view: kind, count });
      }
    }
  }

  for (const name of universe.names) {
    const missingFrom = kinds.filter((kind) => countIn(universe, kind, name) === 0);
    if (missingFrom.length > 0) {
      issues.push({ type: 'cross-view-absence', name, missingFrom });
    }

    const counts: Partial<Record<ViewKind, number>> = {};
    for (const kind of kinds) counts[kind] = countIn(universe, kind, name);
    if (new Set(Object.values(counts)).size > 1) {
      issues.push({ type: 'count-mismatch', name, counts });
    }
  }

  return issues;
}
