import { DEFAULT_IDENTIFIER_RULES, type IdentifierRules } from './config.js';
import { findDuplicateGroups, removeAndRepair, removeDuplicates } from './graph/dedup.js';
import type { KinematicGraph } from './graph/KinematicGraph.js';
import type { DuplicateGroup, RemovalResult } from './graph/types.js';
import { UrdfDocument } from './graph/urdf.js';
import { diagnose, extract } from './identifiers/extract.js';
import { apply, validate } from './identifiers/rename.js';
import type { ChangeReport, Inconsistency, NameUniverse, ViewDocuments } from './identifiers/types.js';

export interface IdentifierExtraction {
  universe: NameUniverse;
  diagnostics: Inconsistency[];
}

export type GraphSource = UrdfDocument | KinematicGraph;

export type RemovalTarget = { links: Iterable<string> } | { groups: readonly DuplicateGroup[] };

export function extractIdentifiers(
  views: ViewDocuments,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): IdentifierExtraction {
  const universe = extract(views, rules);
  return { universe, diagnostics: diagnose(universe) };
}

/**
 * Validates `renameMap` against the current documents, then renames in all
 * three views or none.
 */
export function renameIdentifiers(
  views: ViewDocuments,
  renameMap: unknown,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): ChangeReport {
  const universe = extract(views, rules);
  return apply(views, validate(universe, renameMap));
}

export function findDuplicateLinks(source: GraphSource): DuplicateGroup[] {
  return findDuplicateGroups(graphOf(source));
}

/**
 * Removes links by name, or every non-representative member of the given
 * duplicate groups, together with the joints attached to them. Group members
 * are removed by position, so a representative sharing its name with a
 * duplicate stays.
 */
export function removeLinks(source: GraphSource, target: RemovalTarget): RemovalResult {
  if (source instanceof UrdfDocument) {
    return 'groups' in target ? source.removeDuplicates(target.groups) : source.removeLinks(target.links);
  }
  return 'groups' in target ? removeDuplicates(source, target.groups) : removeAndRepair(source, target.links);
}

function graphOf(source: GraphSource): KinematicGraph {
  return source instanceof UrdfDocument ? source.graph : source;
}
