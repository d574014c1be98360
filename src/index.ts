export {
  extractIdentifiers,
  renameIdentifiers,
  findDuplicateLinks,
  removeLinks
} from './operations.js';
export type { GraphSource, IdentifierExtraction, RemovalTarget } from './operations.js';
export { extract, extractView, diagnose } from './identifiers/extract.js';
export {
  apply,
  validate,
  planRename,
  prependDofMapping,
  invertRenameMap,
  RenameMapSchema
} from './identifiers/rename.js';
export { VIEW_LAYOUTS } from './identifiers/rules.js';
export type { ViewLayout } from './identifiers/rules.js';
export {
  formatChangeReport,
  formatInconsistency,
  formatMateReport,
  formatRenamePlan
} from './identifiers/report.js';
export { VIEW_KINDS, loadedViews } from './identifiers/types.js';
export type {
  ChangeReport,
  Inconsistency,
  LoadedView,
  NameUniverse,
  Occurrence,
  RenameMap,
  RenamePlan,
  ViewDocuments,
  ViewExtraction,
  ViewKind
} from './identifiers/types.js';
export { KinematicGraph } from './graph/KinematicGraph.js';
export {
  findDuplicateGroups,
  computeRemovalSet,
  planGroupRemoval,
  planRemoval,
  removeAndRepair,
  removeDuplicates,
  describeAffectedJoint
} from './graph/dedup.js';
export { fingerprint, fingerprintKey, sameStructure } from './graph/fingerprint.js';
export { parseUrdf, UrdfDocument, type LooseJoint } from './graph/urdf.js';
export { describeJoints, describeLinks, describeRobot } from './graph/summary.js';
export type {
  AffectedJoint,
  DuplicateGroup,
  JointDefinition,
  JointLimit,
  JointType,
  KinematicGraphDefinition,
  LinkDefinition,
  NamedJointDefinition,
  Placement,
  RemovalPlan,
  RemovalResult,
  StructuralFingerprint
} from './graph/types.js';
export { RobotStore } from './store/RobotStore.js';
export { readRobotArchive, writeRobotArchive } from './store/archive.js';
export type { RobotBundle, ZipInput } from './store/archive.js';
export { RobotWorkspace } from './RobotWorkspace.js';
export type { LinkRemovalOutcome, MateReport, RenameOutcome } from './RobotWorkspace.js';
export { resolveConfig, DEFAULT_IDENTIFIER_RULES, DEFAULT_DOCUMENT_FILES } from './config.js';
export type { IdentifierRules, ToolsConfig, ToolsConfigInput } from './config.js';
export { createConsoleLogger, silentLogger } from './logging.js';
export type { Logger, LogLevel } from './logging.js';
export * from './errors.js';
export { runCli } from './cli.js';
