import { z } from 'zod';
import { ConfigError } from './errors.js';

export const ROBOTS_DIR_ENV = 'URDF_MATE_TOOLS_ROBOTS_DIR';

const nonEmpty = z.string().trim().min(1);

export const IdentifierRulesSchema = z.object({
  dofPrefix: nonEmpty.default('dof_'),
  legacyAssemblyNames: z.array(nonEmpty).default(['Planar 1']),
  excludedFeatureNames: z.array(nonEmpty).default(['Fastened 1'])
});

export type IdentifierRules = z.infer<typeof IdentifierRulesSchema>;

export const DocumentFilesSchema = z.object({
  values: nonEmpty.default('matevalues_data.json'),
  features: nonEmpty.default('features_data.json'),
  assembly: nonEmpty.default('assembly_data.json'),
  urdf: nonEmpty.default('robot.urdf')
});

export type DocumentFiles = z.infer<typeof DocumentFilesSchema>;

export const DEFAULT_DOCUMENT_FILES: DocumentFiles = DocumentFilesSchema.parse({});

export const ToolsConfigSchema = z.object({
  robotsDir: nonEmpty.default('robots'),
  backupSuffix: z
    .string()
    .regex(/^\.[\w.-]+$/, 'must start with "." and contain no path separators')
    .default('.backup'),
  files: DocumentFilesSchema.default({}),
  identifiers: IdentifierRulesSchema.default({})
});

export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type ToolsConfigInput = z.input<typeof ToolsConfigSchema>;

export const DEFAULT_IDENTIFIER_RULES: IdentifierRules = IdentifierRulesSchema.parse({});

/**
 * Builds the effective configuration: explicit overrides win over the
 * environment, which wins over defaults.
 */
export function resolveConfig(
  overrides: ToolsConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ToolsConfig {
  const fromEnv: ToolsConfigInput = {};
  const robotsDir = env[ROBOTS_DIR_ENV];
  if (robotsDir) fromEnv.robotsDir = robotsDir;

  const result = ToolsConfigSchema.safeParse({ ...fromEnv, ...stripUndefined(overrides) });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration. ${detail}`);
  }
  return result.data;
}

function stripUndefined(input: ToolsConfigInput): ToolsConfigInput {
  const output: ToolsConfigInput = {};
  if (input.robotsDir !== undefined) output.robotsDir = input.robotsDir;
  if (input.backupSuffix !== undefined) output.backupSuffix = input.backupSuffix;
  if (input.files !== undefined) output.files = input.files;
  if (input.identifiers !== undefined) output.identifiers = input.identifiers;
  return output;
}
