export type JointType =
  | 'fixed'
  | 'revolute'
  | 'continuous'
  | 'prismatic'
  | 'planar'
  | 'floating';

export const JOINT_TYPES: readonly JointType[] = [
  'fixed',
  'revolute',
  'continuous',
  'prismatic',
  'planar',
  'floating'
];

export interface JointLimit {
  lower?: number;
  upper?: number;
  velocity?: number;
  effort?: number;
}

/** Raw `xyz` / `rpy` attribute text of an `<origin>`; compared verbatim. */
export interface Placement {
  xyz: string;
  rpy: string;
}

export interface LinkDefinition {
  name: string;
  /** Mesh file base names: every visual mesh, then collision meshes not already listed. */
  meshes: string[];
  /** One placement per visual entry, then one per collision entry. */
  placements: Placement[];
  /** rgba text of each visual material colour. */
  colors: string[];
  mass?: number;
}

export interface JointDefinition {
  name: string;
  type: JointType | 'unknown';
  parentLink: number;
  childLink: number;
  origin?: Placement;
  axis?: string;
  limit?: JointLimit;
}

/** A joint whose endpoints are given by link name rather than index. */
export interface NamedJointDefinition extends Omit<JointDefinition, 'parentLink' | 'childLink'> {
  parent: string;
  child: string;
}

export interface KinematicGraphDefinition {
  name: string;
  links: LinkDefinition[];
  joints: JointDefinition[];
}

export interface GroupMember {
  index: number;
  name: string;
}

export interface StructuralFingerprint {
  meshes: string[];
  placements: Placement[];
  colors: string[];
}

export interface DuplicateGroup {
  key: string;
  fingerprint: StructuralFingerprint;
  /** Members in graph order; the first one is kept. */
  links: GroupMember[];
  representative: string;
}

export type RemovalReason = 'parent' | 'child' | 'both';

export interface AffectedJoint {
  /** Graph joint index; -1 for a joint that names only one link. */
  index: number;
  name: string;
  type: JointDefinition['type'];
  parent: string;
  child: string;
  reason: RemovalReason;
}

export interface RemovalPlan {
  /** Distinct requested names, in request order. */
  names: string[];
  linkIndices: number[];
  joints: AffectedJoint[];
  /** Requested names that match no link. */
  unmatched: string[];
}

export interface RemovalResult {
  removedCount: number;
  removedLinks: string[];
  affectedJoints: AffectedJoint[];
  unmatched: string[];
}
