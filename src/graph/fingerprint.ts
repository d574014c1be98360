import type { LinkDefinition, StructuralFingerprint } from './types.js';

/**
 * Structural identity of a link: its meshes, placements and colours, with the
 * name and mass left out. Links without a mesh are not candidates and yield
 * `null`.
 */
export function fingerprint(link: LinkDefinition): StructuralFingerprint | null {
  if (link.meshes.length === 0) return null;
  return {
    meshes: link.meshes.slice().sort(),
    placements: link.placements.map((placement) => ({ xyz: placement.xyz, rpy: placement.rpy })),
    colors: link.colors.slice().sort()
  };
}

export function fingerprintKey(value: StructuralFingerprint): string {
  return JSON.stringify([
    value.meshes,
    value.placements.map((placement) => [placement.xyz, placement.rpy]),
    value.colors
  ]);
}

export function sameStructure(a: LinkDefinition, b: LinkDefinition): boolean {
  const left = fingerprint(a);
  const right = fingerprint(b);
  if (!left || !right) return false;
  return fingerprintKey(left) === fingerprintKey(right);
}
