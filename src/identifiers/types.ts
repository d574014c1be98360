export type ViewKind = 'values' | 'features' | 'assembly';

export const VIEW_KINDS: readonly ViewKind[] = ['values', 'features', 'assembly'];

export type JsonObject = { [key: string]: unknown };

export type LoadedView =
  | { status: 'loaded'; data: unknown }
  | { status: 'unavailable'; reason: string };

export type ViewDocuments = Record<ViewKind, LoadedView>;

export type RenameMap = Record<string, string>;

export interface Occurrence {
  name: string;
  /** Position of the entry in its collection. */
  index: number;
  /** JSON pointer to the identifier field. */
  path: string;
}

export interface ViewExtraction {
  kind: ViewKind;
  occurrences: Occurrence[];
  counts: Map<string, number>;
}

export interface UnavailableView {
  kind: ViewKind;
  reason: string;
}

export interface NameUniverse {
  views: Partial<Record<ViewKind, ViewExtraction>>;
  /** Distinct names across every loaded view, sorted. */
  names: string[];
  unavailable: UnavailableView[];
}

export type Inconsistency =
  | { type: 'intra-view-duplication'; name: string; view: ViewKind; count: number }
  | { type: 'cross-view-absence'; name: string; missingFrom: ViewKind[] }
  | { type: 'count-mismatch'; name: string; counts: Partial<Record<ViewKind, number>> }
  | { type: 'document-unavailable'; view: ViewKind; reason: string };

export interface ViewChanges {
  total: number;
  byName: Record<string, number>;
}

export interface RenamePairReport {
  from: string;
  to: string;
  counts: Record<ViewKind, number>;
  total: number;
}

export interface ChangeReport {
  views: Record<ViewKind, ViewChanges>;
  renames: RenamePairReport[];
  total: number;
  /** Keys that were valid but matched no live occurrence in any view. */
  zeroEffect: string[];
}

export interface RenamePlanEntry {
  from: string;
  to: string;
  instances: number;
}

export interface RenamePlan {
  entries: RenamePlanEntry[];
  totalInstances: number;
}

export function perView<T>(build: (kind: ViewKind) => T): Record<ViewKind, T> {
  return {
    values: build('values'),
    features: build('features'),
    assembly: build('assembly')
  };
}

export function loadedViews(data: Record<ViewKind, unknown>): ViewDocuments {
  return perView((kind): LoadedView => ({ status: 'loaded', data: data[kind] }));
}
