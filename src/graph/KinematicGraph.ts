import { GraphIntegrityError, type DanglingJoint } from '../errors.js';
import type {
  JointDefinition,
  KinematicGraphDefinition,
  LinkDefinition,
  NamedJointDefinition
} from './types.js';

/**
 * Links and joints held in two tables; joints point at links by index, so a
 * dangling edge is an index outside the live link table.
 */
export class KinematicGraph {
  readonly name: string;

  private linkTable: LinkDefinition[];
  private jointTable: JointDefinition[];
  private linkMap = new Map<string, number>();
  private jointMap = new Map<string, number>();

  constructor(definition: KinematicGraphDefinition) {
    this.name = definition.name;
    this.linkTable = definition.links.slice();
    this.jointTable = definition.joints.slice();
    this.reindex();
    this.assertIntegrity();
  }

  /**
   * Builds a graph from joints that name their links. Unknown names are an
   * integrity error; with duplicate link names the first link wins.
   */
  static fromNamedJoints(
    name: string,
    links: LinkDefinition[],
    joints: NamedJointDefinition[]
  ): KinematicGraph {
    const firstIndex = new Map<string, number>();
    links.forEach((link, index) => {
      if (!firstIndex.has(link.name)) firstIndex.set(link.name, index);
    });

    const dangling: DanglingJoint[] = [];
    const resolved: JointDefinition[] = joints.map(({ parent, child, ...joint }) => {
      const parentLink = firstIndex.get(parent);
      const childLink = firstIndex.get(child);
      const missing = [parent, child].filter((linkName) => !firstIndex.has(linkName));
      if (missing.length > 0) dangling.push({ joint: joint.name, missing });
      return { ...joint, parentLink: parentLink ?? -1, childLink: childLink ?? -1 };
    });

    if (dangling.length > 0) throw new GraphIntegrityError(dangling);
    return new KinematicGraph({ name, links, joints: resolved });
  }

  get links(): readonly LinkDefinition[] {
    return this.linkTable;
  }

  get joints(): readonly JointDefinition[] {
    return this.jointTable;
  }

  getLink(nameOrIndex: string | number): LinkDefinition | undefined {
    if (typeof nameOrIndex === 'number') {
      return this.linkTable[nameOrIndex];
    }
    const index = this.linkMap.get(nameOrIndex);
    return index === undefined ? undefined : this.linkTable[index];
  }

  getJoint(nameOrIndex: string | number): JointDefinition | undefined {
    if (typeof nameOrIndex === 'number') {
      return this.jointTable[nameOrIndex];
    }
    const index = this.jointMap.get(nameOrIndex);
    return index === undefined ? undefined : this.jointTable[index];
  }

  parentName(joint: JointDefinition): string {
    return this.linkTable[joint.parentLink]?.name ?? '<missing>';
  }

  childName(joint: JointDefinition): string {
    return this.linkTable[joint.childLink]?.name ?? '<missing>';
  }

  danglingJoints(): DanglingJoint[] {
    const dangling: DanglingJoint[] = [];
    for (const joint of this.jointTable) {
      const missing: string[] = [];
      if (!this.isLiveLink(joint.parentLink)) missing.push(`parent #${joint.parentLink}`);
      if (!this.isLiveLink(joint.childLink)) missing.push(`child #${joint.childLink}`);
      if (missing.length > 0) dangling.push({ joint: joint.name, missing });
    }
    return dangling;
  }

  assertIntegrity(): void {
    const dangling = this.danglingJoints();
    if (dangling.length > 0) throw new GraphIntegrityError(dangling);
  }

  /**
   * Drops the given links and joints and renumbers the survivors. The new
   * tables are checked before they replace the old ones, so a surviving joint
   * that still points at a dropped link leaves the graph untouched.
   */
  compact(removedLinks: ReadonlySet<number>, removedJoints: ReadonlySet<number>): void {
    const remap = new Map<number, number>();
    const links: LinkDefinition[] = [];
    this.linkTable.forEach((link, index) => {
      if (removedLinks.has(index)) return;
      remap.set(index, links.length);
      links.push(link);
    });

    const dangling: DanglingJoint[] = [];
    const joints: JointDefinition[] = [];
    this.jointTable.forEach((joint, index) => {
      if (removedJoints.has(index)) return;
      const parentLink = remap.get(joint.parentLink);
      const childLink = remap.get(joint.childLink);
      if (parentLink === undefined || childLink === undefined) {
        const missing: string[] = [];
        if (parentLink === undefined) missing.push(this.parentName(joint));
        if (childLink === undefined) missing.push(this.childName(joint));
        dangling.push({ joint: joint.name, missing });
        return;
      }
      joints.push({ ...joint, parentLink, childLink });
    });

    if (dangling.length > 0) throw new GraphIntegrityError(dangling);

    this.linkTable = links;
    this.jointTable = joints;
    this.reindex();
  }

  toDefinition(): KinematicGraphDefinition {
    return {
      name: this.name,
      links: this.linkTable.slice(),
      joints: this.jointTable.map((joint) => ({ ...joint }))
    };
  }

  private isLiveLink(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.linkTable.length;
  }

  private reindex(): void {
    this.linkMap.clear();
    this.jointMap.clear();
    this.linkTable.forEach((link, index) => {
      if (!this.linkMap.has(link.name)) this.linkMap.set(link.name, index);
    });
    this.jointTable.forEach((joint, index) => {
      if (!this.jointMap.has(joint.name)) this.jointMap.set(joint.name, index);
    });
  }
}
