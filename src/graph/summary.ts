import type { KinematicGraph } from './KinematicGraph.js';
import type { JointLimit, Placement } from './types.js';

const RULE = '='.repeat(50);

export function describeRobot(graph: KinematicGraph): string {
  const jointTypes = new Map<string, number>();
  for (const joint of graph.joints) {
    jointTypes.set(joint.type, (jointTypes.get(joint.type) ?? 0) + 1);
  }
  const typeSummary = [...jointTypes].map(([type, count]) => `${type}=${count}`).join(', ');
  const meshes = new Set(graph.links.flatMap((link) => link.meshes));

  return [
    `ROBOT SUMMARY: ${graph.name}`,
    '='.repeat(40),
    `Links: ${graph.links.length}`,
    `Joints: ${graph.joints.length}${typeSummary ? ` - ${typeSummary}` : ''}`,
    `Mesh files: ${meshes.size}`,
    '',
    'Link names:',
    graph.links.map((link) => link.name).join(', '),
    '',
    'Joint names:',
    graph.joints.map((joint) => joint.name).join(', ')
  ].join('\n');
}

export function describeLinks(graph: KinematicGraph): string {
  const output = [`ROBOT LINKS (${graph.links.length} total):`, RULE];

  for (const link of graph.links) {
    output.push('', `LINK: ${link.name}`);
    if (link.meshes.length > 0) output.push(`  Meshes: ${link.meshes.join(', ')}`);
    link.placements.forEach((placement, index) => {
      output.push(`  Origin ${index + 1}: ${formatPlacement(placement)}`);
    });
    if (link.colors.length > 0) output.push(`  Colors: ${link.colors.join(' | ')}`);
    if (link.mass !== undefined) output.push(`  Mass: ${link.mass}`);
  }

  return output.join('\n');
}

export function describeJoints(graph: KinematicGraph): string {
  const output = [`ROBOT JOINTS (${graph.joints.length} total):`, RULE];

  for (const joint of graph.joints) {
    output.push('', `JOINT: ${joint.name} (type: ${joint.type})`);
    output.push(`  Connection: ${graph.parentName(joint)} -> ${graph.childName(joint)}`);
    if (joint.origin) output.push(`  Origin: ${formatPlacement(joint.origin)}`);
    if (joint.axis) output.push(`  Axis: ${joint.axis}`);
    if (joint.limit) output.push(`  Limits: ${formatLimit(joint.limit)}`);
  }

  return output.join('\n');
}

function formatPlacement(placement: Placement): string {
  return `xyz=${placement.xyz}, rpy=${placement.rpy}`;
}

function formatLimit(limit: JointLimit): string {
  const show = (value: number | undefined) => (value === undefined ? 'none' : String(value));
  return `lower=${show(limit.lower)}, upper=${show(limit.upper)}, effort=${show(limit.effort)}, velocity=${show(limit.velocity)}`;
}
