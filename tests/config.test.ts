import { resolveConfig, ROBOTS_DIR_ENV } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { createConsoleLogger, isLogLevel } from '../src/logging.js';

test('defaults apply when nothing is configured', () => {
  expect(resolveConfig({}, {})).toEqual({
    robotsDir: 'robots',
    backupSuffix: '.backup',
    files: {
      values: 'matevalues_data.json',
      features: 'features_data.json',
      assembly: 'assembly_data.json',
      urdf: 'robot.urdf'
    },
    identifiers: {
      dofPrefix: 'dof_',
      legacyAssemblyNames: ['Planar 1'],
      excludedFeatureNames: ['Fastened 1']
    }
  });
});

test('explicit settings win over the environment', () => {
  const env = { [ROBOTS_DIR_ENV]: '/data/robots' };

  expect(resolveConfig({}, env).robotsDir).toBe('/data/robots');
  expect(resolveConfig({ robotsDir: undefined }, env).robotsDir).toBe('/data/robots');
  expect(resolveConfig({ robotsDir: './local' }, env).robotsDir).toBe('./local');
});

test('partial identifier rules keep the remaining defaults', () => {
  const config = resolveConfig({ identifiers: { dofPrefix: 'joint_' } }, {});

  expect(config.identifiers).toEqual({
    dofPrefix: 'joint_',
    legacyAssemblyNames: ['Planar 1'],
    excludedFeatureNames: ['Fastened 1']
  });
});

test('invalid settings raise a ConfigError naming the field', () => {
  expect(() => resolveConfig({ backupSuffix: '/../bak' }, {})).toThrow(ConfigError);
  expect(() => resolveConfig({ backupSuffix: '/../bak' }, {})).toThrow(
    'Invalid configuration. backupSuffix: must start with "." and contain no path separators'
  );
  expect(() => resolveConfig({ robotsDir: '  ' }, {})).toThrow('robotsDir:');
});

test('the console logger drops messages below its level', () => {
  const sink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const logger = createConsoleLogger('warn', sink);

  logger.debug('d');
  logger.info('i');
  logger.warn('w');
  logger.error('e');

  expect(sink.debug).not.toHaveBeenCalled();
  expect(sink.info).not.toHaveBeenCalled();
  expect(sink.warn).toHaveBeenCalledWith('w');
  expect(sink.error).toHaveBeenCalledWith('e');
  expect(isLogLevel('silent')).toBe(true);
  expect(isLogLevel('verbose')).toBe(false);
});
