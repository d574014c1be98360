import { resolveConfig, type ToolsConfig, type ToolsConfigInput } from './config.js';
import { DocumentUnavailableError } from './errors.js';
import { describeAffectedJoint } from './graph/dedup.js';
import { describeJoints, describeLinks, describeRobot } from './graph/summary.js';
import type { DuplicateGroup, RemovalPlan, RemovalResult } from './graph/types.js';
import { diagnose, extract } from './identifiers/extract.js';
import { apply, planRename, prependDofMapping, validate } from './identifiers/rename.js';
import {
  VIEW_KINDS,
  type ChangeReport,
  type Inconsistency,
  type NameUniverse,
  type RenameMap,
  type RenamePlan
} from './identifiers/types.js';
import { silentLogger, type Logger } from './logging.js';
import { RobotStore } from './store/RobotStore.js';

export interface RobotWorkspaceOptions {
  config?: ToolsConfigInput;
  logger?: Logger;
  store?: RobotStore;
}

export interface MateReport {
  universe: NameUniverse;
  diagnostics: Inconsistency[];
}

export interface RenameOutcome {
  plan: RenamePlan;
  /** Absent on a dry run. */
  report?: ChangeReport;
  backups: string[];
  diagnostics: Inconsistency[];
}

export interface LinkRemovalOutcome {
  groups: DuplicateGroup[];
  plan: RemovalPlan;
  /** Absent on a dry run or when nothing matched. */
  result?: RemovalResult;
  backups: string[];
}

export type DescribeSection = 'summary' | 'links' | 'joints';

/**
 * Load, change and persist one robot's documents. Every call reads fresh
 * documents from the store; nothing is cached between calls.
 */
export class RobotWorkspace {
  readonly config: ToolsConfig;
  private readonly store: RobotStore;
  private readonly logger: Logger;

  constructor(options: RobotWorkspaceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.config = options.store?.config ?? resolveConfig(options.config);
    this.store = options.store ?? new RobotStore(this.config, this.logger);
  }

  async readMates(robot: string): Promise<MateReport> {
    const universe = extract(await this.store.loadViews(robot), this.config.identifiers);
    return { universe, diagnostics: diagnose(universe) };
  }

  /**
   * Validates the mapping, backs up the three documents, renames in memory and
   * writes all three back. A failed backup stops before anything is renamed.
   * Every view must be readable unless this is a dry run.
   */
  async renameMates(
    robot: string,
    renameMap: unknown,
    options: { dryRun?: boolean } = {}
  ): Promise<RenameOutcome> {
    const views = await this.store.loadViews(robot);
    const universe = extract(views, this.config.identifiers);
    const mapping = validate(universe, renameMap);
    const plan = planRename(universe, mapping);

    if (options.dryRun) {
      return { plan, backups: [], diagnostics: diagnose(universe) };
    }

    for (const kind of VIEW_KINDS) {
      const view = views[kind];
      if (view.status === 'unavailable') {
        throw new DocumentUnavailableError(this.store.filePath(robot, kind), view.reason);
      }
    }

    const backups = await this.store.backupViews(robot);
    const report = apply(views, mapping);
    for (const name of report.zeroEffect) {
      this.logger.warn(`"${name}" is a known mate name but matched no renamable entry.`);
    }

    if (report.total > 0) {
      await this.store.saveViews(robot, views, { backup: false });
    }
    this.logger.info(`Renamed ${report.total} mate instance(s) in ${robot}.`);

    return {
      plan,
      report,
      backups,
      diagnostics: diagnose(extract(views, this.config.identifiers))
    };
  }

  async prependDofPrefix(robot: string, options: { dryRun?: boolean } = {}): Promise<RenameOutcome> {
    const { universe } = await this.readMates(robot);
    const mapping: RenameMap = prependDofMapping(universe, this.config.identifiers);
    if (Object.keys(mapping).length === 0) {
      return { plan: { entries: [], totalInstances: 0 }, backups: [], diagnostics: diagnose(universe) };
    }
    return this.renameMates(robot, mapping, options);
  }

  async findDuplicates(robot: string): Promise<DuplicateGroup[]> {
    const urdf = await this.store.loadUrdf(robot);
    return urdf.findDuplicateGroups();
  }

  /**
   * Removes the given links, or when none are given every duplicate except
   * the first of each group, along with their joints.
   */
  async removeLinks(
    robot: string,
    options: { links?: string[]; dryRun?: boolean } = {}
  ): Promise<LinkRemovalOutcome> {
    const urdf = await this.store.loadUrdf(robot);
    const groups = urdf.findDuplicateGroups();
    const plan = options.links
      ? urdf.planRemoval(options.links)
      : urdf.planDuplicateRemoval(groups);

    if (options.dryRun || plan.linkIndices.length === 0) {
      for (const name of plan.unmatched) this.logger.warn(`No link named "${name}".`);
      return { groups, plan, backups: [] };
    }

    const backups = await this.store.backupUrdf(robot);
    const result = urdf.applyRemoval(plan);
    await this.store.saveUrdf(robot, urdf, { backup: false });

    for (const joint of result.affectedJoints) {
      this.logger.info(`Removed joint ${describeAffectedJoint(joint)}`);
    }
    this.logger.info(`Removed ${result.removedCount} link(s) from ${robot}.`);

    return { groups, plan, result, backups };
  }

  async describe(robot: string, section: DescribeSection = 'summary'): Promise<string> {
    const { graph } = await this.store.loadUrdf(robot);
    switch (section) {
      case 'links':
        return describeLinks(graph);
      case 'joints':
        return describeJoints(graph);
      case 'summary':
        return describeRobot(graph);
    }
  }
}
