import { fingerprint, fingerprintKey } from './fingerprint.js';
import type { KinematicGraph } from './KinematicGraph.js';
import type {
  AffectedJoint,
  DuplicateGroup,
  RemovalPlan,
  RemovalReason,
  RemovalResult
} from './types.js';

/**
 * Groups structurally identical links. Groups and their members keep graph
 * order, which makes the first member of each group its representative.
 */
export function findDuplicateGroups(graph: KinematicGraph): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();

  graph.links.forEach((link, index) => {
    const print = fingerprint(link);
    if (!print) return;
    const key = fingerprintKey(print);
    const group = groups.get(key);
    if (group) {
      group.links.push({ index, name: link.name });
    } else {
      groups.set(key, {
        key,
        fingerprint: print,
        links: [{ index, name: link.name }],
        representative: link.name
      });
    }
  });

  return [...groups.values()].filter((group) => group.links.length > 1);
}

export function computeRemovalSet(groups: readonly DuplicateGroup[]): Set<string> {
  const names = new Set<string>();
  for (const group of groups) {
    for (const member of group.links.slice(1)) names.add(member.name);
  }
  return names;
}

export function planRemoval(graph: KinematicGraph, names: Iterable<string>): RemovalPlan {
  const requested = [...new Set(names)];
  const removing = new Set(requested);

  const linkIndices: number[] = [];
  const matched = new Set<string>();
  graph.links.forEach((link, index) => {
    if (!removing.has(link.name)) return;
    linkIndices.push(index);
    matched.add(link.name);
  });

  return buildPlan(
    graph,
    requested,
    linkIndices,
    requested.filter((name) => !matched.has(name))
  );
}

/**
 * Plans the removal of every non-representative group member by index, so a
 * representative that shares its name with a duplicate is kept. Members whose
 * index no longer holds a link of that name are reported as unmatched.
 */
export function planGroupRemoval(
  graph: KinematicGraph,
  groups: readonly DuplicateGroup[]
): RemovalPlan {
  const indices = new Set<number>();
  const names = new Set<string>();
  const unmatched = new Set<string>();

  for (const group of groups) {
    for (const member of group.links.slice(1)) {
      if (graph.getLink(member.index)?.name !== member.name) {
        unmatched.add(member.name);
        continue;
      }
      indices.add(member.index);
      names.add(member.name);
    }
  }

  return buildPlan(
    graph,
    [...names],
    [...indices].sort((a, b) => a - b),
    [...unmatched].filter((name) => !names.has(name))
  );
}

function buildPlan(
  graph: KinematicGraph,
  names: string[],
  linkIndices: number[],
  unmatched: string[]
): RemovalPlan {
  const dropped = new Set(linkIndices);
  const joints: AffectedJoint[] = [];
  graph.joints.forEach((joint, index) => {
    const parentGone = dropped.has(joint.parentLink);
    const childGone = dropped.has(joint.childLink);
    if (!parentGone && !childGone) return;
    const reason: RemovalReason = parentGone && childGone ? 'both' : parentGone ? 'parent' : 'child';
    joints.push({
      index,
      name: joint.name,
      type: joint.type,
      parent: graph.parentName(joint),
      child: graph.childName(joint),
      reason
    });
  });

  return { names, linkIndices, joints, unmatched };
}

/**
 * Removes every link named in `names` and every joint touching one of them.
 * Joints are dropped, never re-pointed at a surviving link.
 */
export function removeAndRepair(graph: KinematicGraph, names: Iterable<string>): RemovalResult {
  const plan = planRemoval(graph, names);
  commitRemoval(graph, plan);
  return removalResult(plan);
}

export function removeDuplicates(
  graph: KinematicGraph,
  groups: readonly DuplicateGroup[]
): RemovalResult {
  const plan = planGroupRemoval(graph, groups);
  commitRemoval(graph, plan);
  return removalResult(plan);
}

export function commitRemoval(graph: KinematicGraph, plan: RemovalPlan): void {
  graph.compact(
    new Set(plan.linkIndices),
    new Set(plan.joints.filter((joint) => joint.index >= 0).map((joint) => joint.index))
  );
  graph.assertIntegrity();
}

export function removalResult(plan: RemovalPlan): RemovalResult {
  const removed = new Set(plan.names.filter((name) => !plan.unmatched.includes(name)));
  return {
    removedCount: plan.linkIndices.length,
    removedLinks: [...removed],
    affectedJoints: plan.joints,
    unmatched: plan.unmatched
  };
}

export function describeAffectedJoint(joint: AffectedJoint): string {
  const removed = joint.reason === 'both' ? 'parent and child' : joint.reason;
  return `${joint.name} (${joint.type}): ${joint.parent} -> ${joint.child} [${removed} removed]`;
}
