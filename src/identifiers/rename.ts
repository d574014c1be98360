import { z } from 'zod';
import { DEFAULT_IDENTIFIER_RULES, type IdentifierRules } from '../config.js';
import {
  DocumentUnavailableError,
  InvalidRenameMapError,
  PartialApplyFailureError,
  UnknownIdentifierError
} from '../errors.js';
import { countIn, loadedKinds } from './extract.js';
import { renamableSlots, VIEW_LAYOUTS, type IdentifierSlot } from './rules.js';
import {
  perView,
  VIEW_KINDS,
  type ChangeReport,
  type JsonObject,
  type NameUniverse,
  type RenameMap,
  type RenamePlan,
  type ViewDocuments,
  type ViewKind
} from './types.js';

export const RenameMapSchema = z
  .record(z.string().min(1, 'mate names cannot be empty'), z.string().min(1, 'new names cannot be empty'))
  .refine((map) => Object.keys(map).length > 0, 'no rename mapping provided');

type UndoEntry = { holder: JsonObject; field: string; previous: string };

/**
 * Checks a rename map against the name universe. Throws before anything is
 * touched; returns the parsed map on success.
 */
export function validate(universe: NameUniverse, renameMap: unknown): RenameMap {
  const parsed = RenameMapSchema.safeParse(renameMap);
  if (!parsed.success) {
    throw new InvalidRenameMapError(
      `Invalid rename mapping: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }

  const known = new Set(universe.names);
  const unknown = Object.keys(parsed.data).filter((name) => !known.has(name));
  if (unknown.length > 0) throw new UnknownIdentifierError(unknown);

  return parsed.data;
}

/**
 * Renames every matching identifier in all three views. Writes are logged and
 * undone if any view fails, so either every view is renamed or none is.
 */
export function apply(documents: ViewDocuments, renameMap: RenameMap): ChangeReport {
  const data = perView((kind) => {
    const view = documents[kind];
    if (view.status === 'unavailable') throw new DocumentUnavailableError(kind, view.reason);
    return view.data;
  });

  const mapping = new Map(Object.entries(renameMap));
  const counters = perView(() => new Map<string, number>());
  const undo: UndoEntry[] = [];

  for (const kind of VIEW_KINDS) {
    const counter = counters[kind];
    try {
      const slots: IdentifierSlot[] = renamableSlots(VIEW_LAYOUTS[kind], data[kind]);
      for (const slot of slots) {
        const next = mapping.get(slot.name);
        if (next === undefined) continue;
        slot.holder[slot.field] = next;
        undo.push({ holder: slot.holder, field: slot.field, previous: slot.name });
        counter.set(slot.name, (counter.get(slot.name) ?? 0) + 1);
      }
    } catch (error) {
      rollback(undo);
      throw new PartialApplyFailureError(kind, undo.length, error);
    }
  }

  return buildReport(mapping, counters);
}

function rollback(undo: UndoEntry[]): void {
  for (let i = undo.length - 1; i >= 0; i--) {
    const entry = undo[i];
    entry.holder[entry.field] = entry.previous;
  }
}

function buildReport(
  mapping: Map<string, string>,
  counters: Record<ViewKind, Map<string, number>>
): ChangeReport {
  const views = perView((kind) => ({
    total: [...counters[kind].values()].reduce((sum, count) => sum + count, 0),
    byName: Object.fromEntries(counters[kind])
  }));
  const total = views.values.total + views.features.total + views.assembly.total;

  const renames = [...mapping].map(([from, to]) => {
    const counts = perView((kind) => counters[kind].get(from) ?? 0);
    const pairTotal = counts.values + counts.features + counts.assembly;
    return { from, to, counts, total: pairTotal };
  });

  const zeroEffect = renames.filter((entry) => entry.total === 0).map((entry) => entry.from);

  return { views, renames, total, zeroEffect };
}

/**
 * Expected instance count per rename, taken as the largest count among the
 * loaded views.
 */
export function planRename(universe: NameUniverse, renameMap: RenameMap): RenamePlan {
  const kinds = loadedKinds(universe);
  const entries = Object.entries(renameMap).map(([from, to]) => ({
    from,
    to,
    instances: Math.max(0, ...kinds.map((kind) => countIn(universe, kind, from)))
  }));
  return {
    entries,
    totalInstances: entries.reduce((sum, entry) => sum + entry.instances, 0)
  };
}

export function prependDofMapping(
  universe: NameUniverse,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): RenameMap {
  const mapping: RenameMap = {};
  for (const name of universe.names) {
    if (!name.startsWith(rules.dofPrefix)) mapping[name] = `${rules.dofPrefix}${name}`;
  }
  return mapping;
}

export function invertRenameMap(renameMap: RenameMap): RenameMap {
  const inverse: RenameMap = {};
  for (const [from, to] of Object.entries(renameMap)) inverse[to] = from;
  return inverse;
}
