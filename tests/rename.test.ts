import {
  DocumentUnavailableError,
  InvalidRenameMapError,
  PartialApplyFailureError,
  UnknownIdentifierError
} from '../src/errors.js';
import { extract } from '../src/identifiers/extract.js';
import {
  apply,
  invertRenameMap,
  planRename,
  prependDofMapping,
  validate
} from '../src/identifiers/rename.js';
import { formatChangeReport, formatRenamePlan } from '../src/identifiers/report.js';
import { loadedViews, type ViewDocuments } from '../src/identifiers/types.js';
import { renameIdentifiers } from '../src/operations.js';
import { assemblyDoc, featuresDoc, valuesDoc, viewsOf } from './helpers.js';

function dataOf(views: ViewDocuments) {
  return {
    values: views.values.status === 'loaded' ? views.values.data : undefined,
    features: views.features.status === 'loaded' ? views.features.data : undefined,
    assembly: views.assembly.status === 'loaded' ? views.assembly.data : undefined
  };
}

test('renames a mate in all three views', () => {
  const views = viewsOf(['Revolute 1'], ['Revolute 1'], ['Revolute 1']);

  const report = renameIdentifiers(views, { 'Revolute 1': 'dof_hip' });

  expect(report.views.values.total).toBe(1);
  expect(report.views.features.total).toBe(1);
  expect(report.views.assembly.total).toBe(1);
  expect(report.total).toBe(3);
  expect(report.renames).toEqual([
    {
      from: 'Revolute 1',
      to: 'dof_hip',
      counts: { values: 1, features: 1, assembly: 1 },
      total: 3
    }
  ]);
  expect(report.zeroEffect).toEqual([]);
  expect(dataOf(views)).toEqual({
    values: valuesDoc(['dof_hip']),
    features: featuresDoc(['dof_hip']),
    assembly: assemblyDoc(['dof_hip'])
  });
  expect(extract(views).names).toEqual(['dof_hip']);
  expect(formatChangeReport(report)).toBe(
    ["Renamed 3 instance(s):", "  'Revolute 1' -> 'dof_hip': values=1, features=1, assembly=1"].join('\n')
  );
});

test('unknown names are rejected before any document changes', () => {
  const views = viewsOf(['dof_a'], ['dof_a'], ['dof_a']);
  const before = structuredClone(dataOf(views));

  expect(() => renameIdentifiers(views, { 'Unknown Mate': 'dof_x' })).toThrow(UnknownIdentifierError);
  try {
    renameIdentifiers(views, { dof_a: 'dof_b', 'Unknown Mate': 'dof_x' });
  } catch (error) {
    expect(error).toBeInstanceOf(UnknownIdentifierError);
    if (error instanceof UnknownIdentifierError) {
      expect(error.names).toEqual(['Unknown Mate']);
      expect(error.message).toBe('Mate names not found: "Unknown Mate"');
    }
  }
  expect(dataOf(views)).toEqual(before);
});

test('malformed rename maps are rejected', () => {
  const universe = extract(viewsOf(['dof_a'], ['dof_a'], ['dof_a']));

  expect(() => validate(universe, {})).toThrow('Invalid rename mapping: no rename mapping provided');
  expect(() => validate(universe, { dof_a: '' })).toThrow('new names cannot be empty');
  expect(() => validate(universe, ['dof_a'])).toThrow(InvalidRenameMapError);
  expect(() => validate(universe, { dof_a: 7 })).toThrow(InvalidRenameMapError);
  expect(validate(universe, { dof_a: 'dof_b' })).toEqual({ dof_a: 'dof_b' });
});

test('a failure in a later view rolls back the earlier views', () => {
  const values = valuesDoc(['dof_knee', 'dof_hip']);
  const features = featuresDoc(['dof_knee']);
  const assembly = assemblyDoc(['dof_knee']);
  Object.freeze(assembly.rootAssembly.features[0].featureData);
  const views = loadedViews({ values, features, assembly });

  expect(() => apply(views, { dof_knee: 'dof_knee_pitch' })).toThrow(PartialApplyFailureError);

  expect(values).toEqual(valuesDoc(['dof_knee', 'dof_hip']));
  expect(features).toEqual(featuresDoc(['dof_knee']));
  expect(assembly.rootAssembly.features[0].featureData.name).toBe('dof_knee');
});

test('reports which view failed and how many writes were undone', () => {
  const views = loadedViews({
    values: valuesDoc(['dof_knee']),
    features: featuresDoc(['dof_knee']),
    assembly: { rootAssembly: { features: [{ featureData: 'not an object' }] } }
  });

  try {
    apply(views, { dof_knee: 'dof_knee_pitch' });
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(PartialApplyFailureError);
    if (error instanceof PartialApplyFailureError) {
      expect(error.view).toBe('assembly');
      expect(error.rolledBack).toBe(2);
    }
  }
  expect(dataOf(views).values).toEqual(valuesDoc(['dof_knee']));
  expect(dataOf(views).features).toEqual(featuresDoc(['dof_knee']));
});

test('applying a map and then its inverse restores every document', () => {
  const features = featuresDoc(['Revolute 1', 'Slider 2', 'Fastened 1']);
  features.features.push({
    typeName: 'BTMMateConnector',
    message: { featureType: 'mateConnector', featureId: 'F9', name: 'Revolute 1' }
  });
  const views = loadedViews({
    values: valuesDoc(['Revolute 1', 'Slider 2', 'Revolute 1']),
    features,
    assembly: assemblyDoc(['Revolute 1', 'Planar 1', 'Slider 2'])
  });
  const original = structuredClone(dataOf(views));
  const mapping = { 'Revolute 1': 'dof_r1', 'Slider 2': 'dof_s2' };

  const forward = renameIdentifiers(views, mapping);
  expect(forward.renames.map((entry) => entry.counts)).toEqual([
    { values: 2, features: 1, assembly: 1 },
    { values: 1, features: 1, assembly: 1 }
  ]);
  expect(features.features[3].message.name).toBe('Revolute 1');

  const backward = renameIdentifiers(views, invertRenameMap(mapping));
  expect(backward.total).toBe(forward.total);
  expect(dataOf(views)).toEqual(original);
});

test('keys that match no renamable entry are reported as zero-effect', () => {
  const views = viewsOf(['dof_a'], ['dof_a'], ['dof_a']);
  const report = apply(views, { dof_a: 'dof_b', ghost: 'dof_ghost' });

  expect(report.total).toBe(3);
  expect(report.zeroEffect).toEqual(['ghost']);
});

test('apply needs every view loaded', () => {
  const views: ViewDocuments = {
    values: { status: 'loaded', data: valuesDoc(['dof_a']) },
    features: { status: 'unavailable', reason: 'file not found' },
    assembly: { status: 'loaded', data: assemblyDoc(['dof_a']) }
  };

  expect(() => apply(views, { dof_a: 'dof_b' })).toThrow(DocumentUnavailableError);
  expect(dataOf(views).values).toEqual(valuesDoc(['dof_a']));
});

test('plans the largest per-view count for each rename', () => {
  const universe = extract(viewsOf(['dof_a', 'dof_a'], ['dof_a', 'dof_b'], ['dof_a']));
  const plan = planRename(universe, { dof_a: 'dof_x', dof_b: 'dof_y' });

  expect(plan).toEqual({
    entries: [
      { from: 'dof_a', to: 'dof_x', instances: 2 },
      { from: 'dof_b', to: 'dof_y', instances: 1 }
    ],
    totalInstances: 3
  });
  expect(formatRenamePlan(plan)).toBe(
    [
      "  'dof_a' -> 'dof_x' (2 instances)",
      "  'dof_b' -> 'dof_y' (1 instances)",
      'Total instances to be renamed: 3'
    ].join('\n')
  );
});

test('builds a DOF prefix mapping for unprefixed names only', () => {
  const universe = extract(viewsOf(['Revolute 1', 'dof_a'], ['Revolute 1', 'dof_a'], ['Planar 1', 'dof_a']));

  expect(prependDofMapping(universe)).toEqual({
    'Planar 1': 'dof_Planar 1',
    'Revolute 1': 'dof_Revolute 1'
  });
  expect(
    prependDofMapping(universe, { dofPrefix: 'joint_', legacyAssemblyNames: [], excludedFeatureNames: [] })
  ).toEqual({
    'Planar 1': 'joint_Planar 1',
    'Revolute 1': 'joint_Revolute 1',
    dof_a: 'joint_dof_a'
  });
});
