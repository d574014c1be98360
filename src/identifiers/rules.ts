import { DEFAULT_IDENTIFIER_RULES, type IdentifierRules } from '../config.js';
import { DocumentShapeError } from '../errors.js';
import type { JsonObject, ViewKind } from './types.js';

/**
 * Where a view keeps its identifiers and which of them count.
 *
 * `collection` is the path from the document root to the entry array,
 * `holder` the key inside each entry that owns the identifier field (the
 * entry itself when omitted).
 */
export interface ViewLayout {
  kind: ViewKind;
  collection: readonly string[];
  holder?: string;
  field: string;
  /** Entries a rename may rewrite. */
  renames(holder: JsonObject): boolean;
  /** Names that belong to the name universe. */
  tracks(name: string, rules: IdentifierRules): boolean;
}

export interface IdentifierSlot {
  holder: JsonObject;
  field: string;
  name: string;
  index: number;
  path: string;
}

export const VIEW_LAYOUTS: Record<ViewKind, ViewLayout> = {
  values: {
    kind: 'values',
    collection: ['mateValues'],
    field: 'mateName',
    renames: () => true,
    tracks: () => true
  },
  features: {
    kind: 'features',
    collection: ['features'],
    holder: 'message',
    field: 'name',
    renames: (holder) => holder.featureType === 'mate',
    tracks: (name, rules) => !rules.excludedFeatureNames.includes(name)
  },
  assembly: {
    kind: 'assembly',
    collection: ['rootAssembly', 'features'],
    holder: 'featureData',
    field: 'name',
    renames: () => true,
    // Only DOF-prefixed mates and the legacy names are recognised here.
    tracks: (name, rules) =>
      name.startsWith(rules.dofPrefix) || rules.legacyAssemblyNames.includes(name)
  }
};

/**
 * Every identifier slot in the view, in document order. Throws
 * DocumentShapeError when the document does not have the layout's structure.
 */
export function collectSlots(layout: ViewLayout, document: unknown): IdentifierSlot[] {
  if (!isJsonObject(document)) {
    throw new DocumentShapeError(layout.kind, '', 'document is not an object');
  }

  let cursor: unknown = document;
  let path = '';
  for (const key of layout.collection) {
    if (!isJsonObject(cursor)) {
      throw new DocumentShapeError(layout.kind, path, 'expected an object');
    }
    cursor = cursor[key];
    path = `${path}/${escapePointer(key)}`;
    if (cursor === undefined || cursor === null) return [];
  }

  if (!Array.isArray(cursor)) {
    throw new DocumentShapeError(layout.kind, path, 'expected an array');
  }

  const slots: IdentifierSlot[] = [];
  cursor.forEach((entry: unknown, index) => {
    const entryPath = `${path}/${index}`;
    if (!isJsonObject(entry)) {
      throw new DocumentShapeError(layout.kind, entryPath, 'expected an object entry');
    }

    let holder: JsonObject = entry;
    let holderPath = entryPath;
    if (layout.holder) {
      const nested = entry[layout.holder];
      if (nested === undefined || nested === null) return;
      holderPath = `${entryPath}/${escapePointer(layout.holder)}`;
      if (!isJsonObject(nested)) {
        throw new DocumentShapeError(layout.kind, holderPath, 'expected an object');
      }
      holder = nested;
    }

    const name = holder[layout.field];
    if (typeof name !== 'string') return;
    slots.push({
      holder,
      field: layout.field,
      name,
      index,
      path: `${holderPath}/${escapePointer(layout.field)}`
    });
  });

  return slots;
}

export function trackedSlots(
  layout: ViewLayout,
  document: unknown,
  rules: IdentifierRules = DEFAULT_IDENTIFIER_RULES
): IdentifierSlot[] {
  return collectSlots(layout, document).filter(
    (slot) => layout.renames(slot.holder) && layout.tracks(slot.name, rules)
  );
}

export function renamableSlots(layout: ViewLayout, document: unknown): IdentifierSlot[] {
  return collectSlots(layout, document).filter((slot) => layout.renames(slot.holder));
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}
