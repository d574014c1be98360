import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { describeCause, RobotToolsError } from './errors.js';
import { describeAffectedJoint } from './graph/dedup.js';
import { formatChangeReport, formatMateReport, formatRenamePlan } from './identifiers/report.js';
import { createConsoleLogger, type Logger } from './logging.js';
import { RobotWorkspace, type DescribeSection, type RenameOutcome } from './RobotWorkspace.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  logger?: Logger;
}

const USAGE = [
  'Usage: urdf-mate-tools <command> <robot> [options]',
  '',
  'Commands:',
  '  mates <robot>                       List mate names and inconsistencies',
  '  rename <robot> --map <file.json>    Rename mates from a JSON mapping',
  '  rename <robot> --prepend-dof        Prefix every mate name with the DOF prefix',
  '  links <robot> [--remove a,b]        Remove duplicate (or the listed) links',
  '  describe <robot> [--links|--joints] Summarise the URDF',
  '',
  'Options:',
  '  --robots-dir <dir>   Directory holding one folder per robot',
  '  --dry-run            Report what would change without writing'
].join('\n');

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'robots-dir': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      map: { type: 'string' },
      'prepend-dof': { type: 'boolean', default: false },
      remove: { type: 'string' },
      links: { type: 'boolean', default: false },
      joints: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });
}

export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(`Error: ${describeCause(error)}`);
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, robot] = positionals;
  if (values.help || !command) {
    io.out(USAGE);
    return values.help ? 0 : 1;
  }
  if (!robot) {
    io.err(`Error: missing robot name for "${command}".`);
    return 1;
  }

  const logger = io.logger ?? createConsoleLogger();
  const dryRun = values['dry-run'] === true;

  try {
    const workspace = new RobotWorkspace({
      config: { robotsDir: values['robots-dir'] },
      logger
    });

    switch (command) {
      case 'mates': {
        const report = await workspace.readMates(robot);
        io.out(formatMateReport(report.universe, report.diagnostics));
        return 0;
      }
      case 'rename': {
        if (values.map && values['prepend-dof']) {
          io.err('Error: use either --map or --prepend-dof, not both.');
          return 1;
        }
        let outcome: RenameOutcome;
        if (values['prepend-dof']) {
          outcome = await workspace.prependDofPrefix(robot, { dryRun });
        } else if (values.map) {
          const mapping: unknown = JSON.parse(await readFile(values.map, 'utf8'));
          outcome = await workspace.renameMates(robot, mapping, { dryRun });
        } else {
          io.err('Error: rename needs --map <file.json> or --prepend-dof.');
          return 1;
        }
        printRename(io, outcome, dryRun);
        return 0;
      }
      case 'links': {
        const links = values.remove
          ?.split(',')
          .map((name) => name.trim())
          .filter(Boolean);
        const outcome = await workspace.removeLinks(robot, { links, dryRun });
        outcome.groups.forEach((group, index) => {
          const removed = group.links.slice(1).map((member) => member.name);
          io.out(`Group ${index + 1}: keep '${group.representative}', duplicates: ${removed.join(', ')}`);
        });
        if (outcome.plan.linkIndices.length === 0) {
          io.out('No links to remove.');
          return 0;
        }
        if (!outcome.result) {
          io.out(`Dry run: would remove ${outcome.plan.linkIndices.length} link(s) and ${outcome.plan.joints.length} joint(s).`);
          for (const joint of outcome.plan.joints) io.out(`  ${describeAffectedJoint(joint)}`);
          return 0;
        }
        io.out(`Removed ${outcome.result.removedCount} link(s): ${outcome.result.removedLinks.join(', ')}`);
        for (const joint of outcome.result.affectedJoints) io.out(`  ${describeAffectedJoint(joint)}`);
        return 0;
      }
      case 'describe': {
        const section: DescribeSection = values.links ? 'links' : values.joints ? 'joints' : 'summary';
        io.out(await workspace.describe(robot, section));
        return 0;
      }
      default:
        io.err(`Error: unknown command "${command}".`);
        io.err(USAGE);
        return 1;
    }
  } catch (error) {
    if (!(error instanceof RobotToolsError) && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    io.err(`Error: ${describeCause(error)}`);
    return 1;
  }
}

function printRename(io: CliIO, outcome: RenameOutcome, dryRun: boolean): void {
  if (outcome.plan.entries.length === 0) {
    io.out('No renames needed.');
    return;
  }
  io.out('Rename summary:');
  io.out(formatRenamePlan(outcome.plan));
  if (dryRun || !outcome.report) {
    io.out('Dry run - no changes made.');
    return;
  }
  io.out(formatChangeReport(outcome.report));
  for (const backup of outcome.backups) io.out(`Backup: ${backup}`);
}
