import { copyFile, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { resolveConfig, type DocumentFiles, type ToolsConfig } from '../config.js';
import {
  BackupFailedError,
  ConfigError,
  describeCause,
  DocumentUnavailableError,
  PersistenceError
} from '../errors.js';
import { parseUrdf, type UrdfDocument } from '../graph/urdf.js';
import { VIEW_KINDS, type LoadedView, type ViewDocuments, type ViewKind } from '../identifiers/types.js';
import { silentLogger, type Logger } from '../logging.js';

type DocumentRole = keyof DocumentFiles;

interface PendingWrite {
  path: string;
  contents: string;
}

export interface WriteOptions {
  /** Copy each target to `<file><backupSuffix>` before overwriting it. Defaults to true. */
  backup?: boolean;
}

/**
 * Reads and writes one robot's documents under `<robotsDir>/<robot>/`.
 * Writes are backup-then-overwrite and all-or-none across the files involved.
 */
export class RobotStore {
  readonly config: ToolsConfig;
  private readonly logger: Logger;

  constructor(config: ToolsConfig = resolveConfig(), logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  robotDir(robot: string): string {
    if (!robot || robot !== basename(robot) || robot === '.' || robot === '..') {
      throw new ConfigError(`Invalid robot name: "${robot}"`);
    }
    return join(this.config.robotsDir, robot);
  }

  filePath(robot: string, role: DocumentRole): string {
    return join(this.robotDir(robot), this.config.files[role]);
  }

  backupPath(path: string): string {
    return `${path}${this.config.backupSuffix}`;
  }

  async loadViews(robot: string): Promise<ViewDocuments> {
    const loaded = await Promise.all(VIEW_KINDS.map((kind) => this.loadView(robot, kind)));
    return { values: loaded[0], features: loaded[1], assembly: loaded[2] };
  }

  async loadUrdf(robot: string): Promise<UrdfDocument> {
    const path = this.filePath(robot, 'urdf');
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new DocumentUnavailableError(path, readFailure(error));
    }
    return parseUrdf(text);
  }

  async backupViews(robot: string): Promise<string[]> {
    return this.backup(VIEW_KINDS.map((kind) => this.filePath(robot, kind)));
  }

  async backupUrdf(robot: string): Promise<string[]> {
    return this.backup([this.filePath(robot, 'urdf')]);
  }

  async saveViews(robot: string, views: ViewDocuments, options: WriteOptions = {}): Promise<void> {
    const writes = VIEW_KINDS.map((kind): PendingWrite => {
      const view = views[kind];
      if (view.status === 'unavailable') {
        throw new DocumentUnavailableError(this.config.files[kind], view.reason);
      }
      return { path: this.filePath(robot, kind), contents: `${JSON.stringify(view.data, null, 2)}\n` };
    });
    await this.writeAll(writes, options);
  }

  async saveUrdf(robot: string, document: UrdfDocument, options: WriteOptions = {}): Promise<void> {
    await this.writeAll([{ path: this.filePath(robot, 'urdf'), contents: document.serialize() }], options);
  }

  private async loadView(robot: string, kind: ViewKind): Promise<LoadedView> {
    const path = this.filePath(robot, kind);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      this.logger.warn(`Could not read ${path}: ${readFailure(error)}`);
      return { status: 'unavailable', reason: readFailure(error) };
    }
    try {
      return { status: 'loaded', data: JSON.parse(text) };
    } catch (error) {
      const reason = `invalid JSON: ${describeCause(error)}`;
      this.logger.warn(`Could not parse ${path}: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  /**
   * Byte-for-byte copies of every path; the first failure aborts with
   * BackupFailedError.
   */
  private async backup(paths: string[]): Promise<string[]> {
    const created: string[] = [];
    for (const path of paths) {
      const target = this.backupPath(path);
      try {
        await copyFile(path, target);
      } catch (error) {
        throw new BackupFailedError(path, error);
      }
      this.logger.info(`Created backup: ${target}`);
      created.push(target);
    }
    return created;
  }

  private async writeAll(writes: PendingWrite[], options: WriteOptions): Promise<void> {
    const backups = options.backup === false ? [] : await this.backup(writes.map((write) => write.path));
    const temps = writes.map((write) => `${write.path}.tmp-${process.pid}`);

    try {
      for (const [index, write] of writes.entries()) {
        await writeFile(temps[index], write.contents, 'utf8');
      }
    } catch (error) {
      await removeAll(temps);
      throw new PersistenceError('Could not stage updated documents; originals are untouched.', error);
    }

    const replaced: number[] = [];
    for (const [index, write] of writes.entries()) {
      try {
        await rename(temps[index], write.path);
        replaced.push(index);
      } catch (error) {
        await removeAll(temps.slice(index));
        if (backups.length === 0) {
          throw new PersistenceError(`Could not replace ${write.path}; no backups to restore from.`, error);
        }
        await this.restore(replaced.map((done) => ({ path: writes[done].path, backup: backups[done] })));
        throw new PersistenceError(
          `Could not replace ${write.path}; restored ${replaced.length} file(s) from backup.`,
          error
        );
      }
      this.logger.info(`Saved ${write.path}`);
    }
  }

  private async restore(entries: Array<{ path: string; backup: string }>): Promise<void> {
    for (const entry of entries) {
      try {
        await copyFile(entry.backup, entry.path);
      } catch (error) {
        throw new PersistenceError(`Restoring ${entry.path} from ${entry.backup} failed.`, error);
      }
    }
  }
}

async function removeAll(paths: string[]): Promise<void> {
  await Promise.all(paths.map((path) => rm(path, { force: true })));
}

function readFailure(error: unknown): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 'file not found';
  return describeCause(error);
}
