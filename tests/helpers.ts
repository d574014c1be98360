import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { KinematicGraph } from '../src/graph/KinematicGraph.js';
import type { LinkDefinition, NamedJointDefinition } from '../src/graph/types.js';
import { loadedViews, type ViewDocuments } from '../src/identifiers/types.js';

export function valuesDoc(names: string[]) {
  return {
    mateValues: names.map((mateName, index) => ({ mateName, rotationZ: index * 0.25 }))
  };
}

export function featuresDoc(names: string[]) {
  return {
    features: names.map((name, index) => ({
      typeName: 'BTMMate',
      message: { featureType: 'mate', featureId: `F${index}`, name }
    }))
  };
}

export function assemblyDoc(names: string[]) {
  return {
    rootAssembly: {
      features: names.map((name, index) => ({
        id: `A${index}`,
        featureType: 'mate',
        featureData: { name, mateType: 'REVOLUTE' }
      }))
    }
  };
}

export function viewsOf(values: string[], features: string[], assembly: string[]): ViewDocuments {
  return loadedViews({
    values: valuesDoc(values),
    features: featuresDoc(features),
    assembly: assemblyDoc(assembly)
  });
}

export function link(name: string, mesh?: string, color = '0.2 0.2 0.2 1', xyz = '0 0 0'): LinkDefinition {
  return {
    name,
    meshes: mesh ? [mesh] : [],
    placements: [{ xyz, rpy: '0 0 0' }],
    colors: [color]
  };
}

export function joint(name: string, parent: string, child: string): NamedJointDefinition {
  return { name, type: 'revolute', parent, child };
}

export function graphOf(links: LinkDefinition[], joints: NamedJointDefinition[]): KinematicGraph {
  return KinematicGraph.fromNamedJoints('test_robot', links, joints);
}

/** Small deterministic PRNG so randomized tests replay identically. */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

export const WALKER_URDF = `<robot name="walker">
  <material name="grey">
    <color rgba="0.5 0.5 0.5 1"/>
  </material>
  <link name="base">
    <visual>
      <origin xyz="0 0 0.1" rpy="0 0 0"/>
      <geometry>
        <mesh filename="package://walker/meshes/base.stl"/>
      </geometry>
      <material name="grey"/>
    </visual>
    <collision>
      <geometry>
        <mesh filename="package://walker/meshes/base.stl"/>
      </geometry>
    </collision>
    <inertial>
      <mass value="2.5"/>
    </inertial>
  </link>
  <link name="wheel_left">
    <visual>
      <origin xyz="0 0.2 0" rpy="1.5708 0 0"/>
      <geometry>
        <mesh filename="package://walker/meshes/wheel.stl"/>
      </geometry>
      <material name="rubber">
        <color rgba="0.1 0.1 0.1 1"/>
      </material>
    </visual>
  </link>
  <link name="wheel_left_2">
    <visual>
      <origin xyz="0 0.2 0" rpy="1.5708 0 0"/>
      <geometry>
        <mesh filename="package://walker/meshes/wheel.stl"/>
      </geometry>
      <material name="rubber">
        <color rgba="0.1 0.1 0.1 1"/>
      </material>
    </visual>
  </link>
  <link name="imu">
    <inertial>
      <mass value="0.01"/>
    </inertial>
  </link>
  <link name="imu_copy">
    <inertial>
      <mass value="0.01"/>
    </inertial>
  </link>
  <joint name="base_to_wheel" type="continuous">
    <parent link="base"/>
    <child link="wheel_left"/>
    <origin xyz="0 0.15 0" rpy="0 0 0"/>
    <axis xyz="0 1 0"/>
    <limit effort="5" velocity="10"/>
  </joint>
  <joint name="base_to_wheel_2" type="continuous">
    <parent link="base"/>
    <child link="wheel_left_2"/>
  </joint>
  <joint name="wheel_to_imu" type="fixed">
    <parent link="wheel_left_2"/>
    <child link="imu"/>
  </joint>
  <joint name="base_to_imu_copy" type="fixed">
    <parent link="base"/>
    <child link="imu_copy"/>
  </joint>
  <transmission name="wheel_transmission">
    <joint name="base_to_wheel"/>
  </transmission>
</robot>
`;

/**
 * Creates `<root>/<robot>/` holding the three mate documents and the URDF.
 */
const tempDirs: string[] = [];

/** Deletes every directory made by `createRobotDir`; run it in `afterEach`. */
export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
}

export async function createRobotDir(
  robot: string,
  docs: { values?: unknown; features?: unknown; assembly?: unknown; urdf?: string }
): Promise<{ root: string; dir: string }> {
  const root = await mkdtemp(join(tmpdir(), 'urdf-mate-tools-'));
  tempDirs.push(root);
  const dir = join(root, robot);
  await mkdir(dir, { recursive: true });
  if (docs.values !== undefined) {
    await writeFile(join(dir, 'matevalues_data.json'), JSON.stringify(docs.values, null, 2));
  }
  if (docs.features !== undefined) {
    await writeFile(join(dir, 'features_data.json'), JSON.stringify(docs.features, null, 2));
  }
  if (docs.assembly !== undefined) {
    await writeFile(join(dir, 'assembly_data.json'), JSON.stringify(docs.assembly, null, 2));
  }
  if (docs.urdf !== undefined) {
    await writeFile(join(dir, 'robot.urdf'), docs.urdf);
  }
  return { root, dir };
}
