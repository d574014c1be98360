import { JSDOM } from 'jsdom';
import { UrdfParseError } from '../errors.js';
import {
  commitRemoval,
  findDuplicateGroups,
  planGroupRemoval,
  planRemoval,
  removalResult
} from './dedup.js';
import { KinematicGraph } from './KinematicGraph.js';
import {
  JOINT_TYPES,
  type AffectedJoint,
  type DuplicateGroup,
  type JointDefinition,
  type JointLimit,
  type LinkDefinition,
  type NamedJointDefinition,
  type Placement,
  type RemovalPlan,
  type RemovalResult
} from './types.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const ZERO = '0 0 0';
const MISSING_END = '<missing>';

/** A `<joint>` that names only one of its links, so it is not a graph edge. */
export interface LooseJoint {
  element: Element;
  name: string;
  type: JointDefinition['type'];
  parent?: string;
  child?: string;
}

/**
 * A parsed URDF: the XML document plus the kinematic graph read from it.
 * `linkElements[i]` is the element behind `graph.links[i]`, and likewise for
 * joints, so removals can be mirrored into the XML.
 */
export class UrdfDocument {
  readonly graph: KinematicGraph;

  private readonly document: Document;
  private readonly serializer: XMLSerializer;
  private linkElements: Element[];
  private jointElements: Element[];
  private looseJoints: LooseJoint[];

  constructor(
    document: Document,
    serializer: XMLSerializer,
    graph: KinematicGraph,
    linkElements: Element[],
    jointElements: Element[],
    looseJoints: LooseJoint[] = []
  ) {
    this.document = document;
    this.serializer = serializer;
    this.graph = graph;
    this.linkElements = linkElements;
    this.jointElements = jointElements;
    this.looseJoints = looseJoints;
  }

  get name(): string {
    return this.graph.name;
  }

  findDuplicateGroups(): DuplicateGroup[] {
    return findDuplicateGroups(this.graph);
  }

  planRemoval(names: Iterable<string>): RemovalPlan {
    return this.withLooseJoints(planRemoval(this.graph, names));
  }

  planDuplicateRemoval(groups: readonly DuplicateGroup[]): RemovalPlan {
    return this.withLooseJoints(planGroupRemoval(this.graph, groups));
  }

  /**
   * Removes the named links and every joint attached to them from both the
   * graph and the XML.
   */
  removeLinks(names: Iterable<string>): RemovalResult {
    return this.applyRemoval(this.planRemoval(names));
  }

  /** Removes every group member except the first, by position. */
  removeDuplicates(groups: readonly DuplicateGroup[]): RemovalResult {
    return this.applyRemoval(this.planDuplicateRemoval(groups));
  }

  /**
   * Applies a plan made against the current graph. The graph is compacted
   * (and checked) first; the XML is only edited once that has succeeded.
   * Loose joints naming a link that no longer exists go with it.
   */
  applyRemoval(plan: RemovalPlan): RemovalResult {
    const loose = this.looseJointsTouching(plan.linkIndices);
    commitRemoval(this.graph, plan);

    this.linkElements = dropElements(this.linkElements, new Set(plan.linkIndices));
    this.jointElements = dropElements(
      this.jointElements,
      new Set(plan.joints.map((joint) => joint.index))
    );
    for (const joint of loose.keys()) removeElement(joint.element);
    this.looseJoints = this.looseJoints.filter((joint) => !loose.has(joint));

    return removalResult({ ...plan, joints: mergeLoose(plan.joints, loose) });
  }

  serialize(): string {
    return `${XML_DECLARATION}\n${this.serializer.serializeToString(this.document)}\n`;
  }

  private withLooseJoints(plan: RemovalPlan): RemovalPlan {
    return { ...plan, joints: mergeLoose(plan.joints, this.looseJointsTouching(plan.linkIndices)) };
  }

  private looseJointsTouching(linkIndices: readonly number[]): Map<LooseJoint, AffectedJoint> {
    const removed = new Set(linkIndices);
    const surviving = new Set(
      this.graph.links.filter((_, index) => !removed.has(index)).map((link) => link.name)
    );
    const gone = new Set<string>();
    for (const index of linkIndices) {
      const name = this.graph.getLink(index)?.name;
      if (name !== undefined && !surviving.has(name)) gone.add(name);
    }

    const touching = new Map<LooseJoint, AffectedJoint>();
    for (const joint of this.looseJoints) {
      const parentGone = joint.parent !== undefined && gone.has(joint.parent);
      const childGone = joint.child !== undefined && gone.has(joint.child);
      if (!parentGone && !childGone) continue;
      touching.set(joint, {
        index: -1,
        name: joint.name,
        type: joint.type,
        parent: joint.parent ?? MISSING_END,
        child: joint.child ?? MISSING_END,
        reason: parentGone && childGone ? 'both' : parentGone ? 'parent' : 'child'
      });
    }
    return touching;
  }
}

function mergeLoose(
  joints: readonly AffectedJoint[],
  loose: Map<LooseJoint, AffectedJoint>
): AffectedJoint[] {
  return [...joints.filter((joint) => joint.index >= 0), ...loose.values()];
}

export function parseUrdf(xmlText: string): UrdfDocument {
  const { window } = new JSDOM('');
  let doc: Document;
  try {
    doc = new window.DOMParser().parseFromString(xmlText, 'application/xml');
  } catch (error) {
    throw new UrdfParseError('Failed to parse URDF XML.', { cause: error });
  }
  if (doc.getElementsByTagName('parsererror').length > 0) {
    throw new UrdfParseError('Failed to parse URDF XML.');
  }

  const robot = doc.documentElement;
  if (!robot || robot.tagName !== 'robot') {
    throw new UrdfParseError('URDF is missing a <robot> root element.');
  }

  const materials = new Map<string, string>();
  for (const material of childElements(robot, 'material')) {
    const name = material.getAttribute('name');
    const rgba = firstChild(material, 'color')?.getAttribute('rgba');
    if (name && rgba) materials.set(name, rgba);
  }

  const linkElements = childElements(robot, 'link');
  const links = linkElements.map((element) => parseLink(element, materials));

  const jointElements: Element[] = [];
  const joints: NamedJointDefinition[] = [];
  const looseJoints: LooseJoint[] = [];
  for (const element of childElements(robot, 'joint')) {
    const joint = parseJoint(element);
    if ('element' in joint) {
      looseJoints.push(joint);
      continue;
    }
    jointElements.push(element);
    joints.push(joint);
  }

  const graph = KinematicGraph.fromNamedJoints(robot.getAttribute('name') ?? 'robot', links, joints);
  return new UrdfDocument(
    doc,
    new window.XMLSerializer(),
    graph,
    linkElements,
    jointElements,
    looseJoints
  );
}

function parseLink(link: Element, materials: Map<string, string>): LinkDefinition {
  const name = link.getAttribute('name');
  if (!name) throw new UrdfParseError('URDF link is missing a name attribute.');

  const meshes: string[] = [];
  const placements: Placement[] = [];
  const colors: string[] = [];

  for (const visual of childElements(link, 'visual')) {
    placements.push(parseOrigin(firstChild(visual, 'origin')));
    const mesh = parseMeshName(visual);
    if (mesh) meshes.push(mesh);
    const color = parseColor(firstChild(visual, 'material'), materials);
    if (color) colors.push(color);
  }

  for (const collision of childElements(link, 'collision')) {
    placements.push(parseOrigin(firstChild(collision, 'origin')));
    const mesh = parseMeshName(collision);
    if (mesh && !meshes.includes(mesh)) meshes.push(mesh);
  }

  const mass = parseNumber(
    firstChild(firstChild(link, 'inertial'), 'mass')?.getAttribute('value') ?? null
  );

  const definition: LinkDefinition = { name, meshes, placements, colors };
  if (mass !== undefined) definition.mass = mass;
  return definition;
}

function parseJoint(joint: Element): NamedJointDefinition | LooseJoint {
  const name = joint.getAttribute('name') ?? 'unnamed';
  const type = parseJointType(joint.getAttribute('type'));
  const parent = firstChild(joint, 'parent')?.getAttribute('link') || undefined;
  const child = firstChild(joint, 'child')?.getAttribute('link') || undefined;
  if (!parent || !child) return { element: joint, name, type, parent, child };

  const definition: NamedJointDefinition = { name, type, parent, child };

  const origin = firstChild(joint, 'origin');
  if (origin) definition.origin = parseOrigin(origin);
  const axis = firstChild(joint, 'axis')?.getAttribute('xyz');
  if (axis) definition.axis = axis;
  const limit = parseLimit(firstChild(joint, 'limit'));
  if (limit) definition.limit = limit;

  return definition;
}

function parseJointType(value: string | null): JointDefinition['type'] {
  return JOINT_TYPES.find((type) => type === value) ?? 'unknown';
}

function parseOrigin(origin: Element | null): Placement {
  if (!origin) {
    return { xyz: ZERO, rpy: ZERO };
  }
  return {
    xyz: origin.getAttribute('xyz') ?? ZERO,
    rpy: origin.getAttribute('rpy') ?? ZERO
  };
}

function parseMeshName(entry: Element): string | null {
  const filename = firstChild(firstChild(entry, 'geometry'), 'mesh')?.getAttribute('filename');
  if (!filename) return null;
  return filename.slice(filename.lastIndexOf('/') + 1);
}

function parseColor(material: Element | null, materials: Map<string, string>): string | undefined {
  if (!material) return undefined;
  const rgba = firstChild(material, 'color')?.getAttribute('rgba');
  if (rgba) return rgba;
  const name = material.getAttribute('name');
  return name ? materials.get(name) : undefined;
}

function parseLimit(limit: Element | null): JointLimit | undefined {
  if (!limit) return undefined;
  const lower = parseNumber(limit.getAttribute('lower'));
  const upper = parseNumber(limit.getAttribute('upper'));
  const velocity = parseNumber(limit.getAttribute('velocity'));
  const effort = parseNumber(limit.getAttribute('effort'));
  return { lower, upper, velocity, effort };
}

function parseNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return undefined;
  return parsed;
}

function childElements(parent: Element, tagName: string): Element[] {
  return Array.from(parent.children).filter((child) => child.tagName === tagName);
}

function firstChild(parent: Element | null | undefined, tagName: string): Element | null {
  if (!parent) return null;
  return childElements(parent, tagName)[0] ?? null;
}

function dropElements(elements: Element[], indices: ReadonlySet<number>): Element[] {
  const kept: Element[] = [];
  elements.forEach((element, index) => {
    if (indices.has(index)) {
      removeElement(element);
    } else {
      kept.push(element);
    }
  });
  return kept;
}

function removeElement(element: Element): void {
  const previous = element.previousSibling;
  if (previous && previous.nodeType === previous.TEXT_NODE && !previous.textContent?.trim()) {
    previous.remove();
  }
  element.remove();
}
