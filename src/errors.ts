/**
 * Typed errors raised by the engines, the store and the configuration layer.
 * Callers can branch on `code` instead of matching messages.
 */

import type { ViewKind } from './identifiers/types.js';

export type RobotToolsErrorCode =
  | 'DOCUMENT_UNAVAILABLE'
  | 'NO_DOCUMENTS_LOADED'
  | 'UNKNOWN_IDENTIFIER'
  | 'INVALID_RENAME_MAP'
  | 'DOCUMENT_SHAPE'
  | 'PARTIAL_APPLY_FAILURE'
  | 'BACKUP_FAILED'
  | 'PERSISTENCE'
  | 'URDF_PARSE'
  | 'GRAPH_INTEGRITY'
  | 'CONFIG';

/**
 * Base class for every error this package throws on purpose.
 */
export abstract class RobotToolsError extends Error {
  abstract readonly code: RobotToolsErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * A required document could not be read or parsed.
 */
export class DocumentUnavailableError extends RobotToolsError {
  readonly code = 'DOCUMENT_UNAVAILABLE';

  constructor(
    readonly document: string,
    readonly reason: string
  ) {
    super(`Document unavailable: ${document} (${reason})`);
  }
}

/**
 * None of the identifier documents could be loaded.
 */
export class NoDocumentsLoadedError extends RobotToolsError {
  readonly code = 'NO_DOCUMENTS_LOADED';

  constructor(readonly reasons: Partial<Record<ViewKind, string>>) {
    const detail = Object.entries(reasons)
      .map(([kind, reason]) => `${kind}: ${reason}`)
      .join('; ');
    super(`No identifier documents could be loaded. ${detail}`);
  }
}

export class UnknownIdentifierError extends RobotToolsError {
  readonly code = 'UNKNOWN_IDENTIFIER';

  constructor(readonly names: string[]) {
    super(`Mate names not found: ${names.map((name) => `"${name}"`).join(', ')}`);
  }
}

export class InvalidRenameMapError extends RobotToolsError {
  readonly code = 'INVALID_RENAME_MAP';
}

/**
 * A document does not have the structure its extraction rule expects.
 */
export class DocumentShapeError extends RobotToolsError {
  readonly code = 'DOCUMENT_SHAPE';

  constructor(
    readonly view: ViewKind,
    readonly path: string,
    detail: string
  ) {
    super(`Unexpected ${view} document shape at ${path || '/'}: ${detail}`);
  }
}

/**
 * Applying a rename failed part-way; all in-memory writes were rolled back.
 */
export class PartialApplyFailureError extends RobotToolsError {
  readonly code = 'PARTIAL_APPLY_FAILURE';

  constructor(
    readonly view: ViewKind,
    readonly rolledBack: number,
    cause: unknown
  ) {
    super(
      `Rename failed while updating the ${view} document; rolled back ${rolledBack} change(s). ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class BackupFailedError extends RobotToolsError {
  readonly code = 'BACKUP_FAILED';

  constructor(
    readonly file: string,
    cause: unknown
  ) {
    super(`Could not back up ${file}; nothing was written. ${describeCause(cause)}`, { cause });
  }
}

export class PersistenceError extends RobotToolsError {
  readonly code = 'PERSISTENCE';

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message} ${describeCause(cause)}`, { cause });
  }
}

export class UrdfParseError extends RobotToolsError {
  readonly code = 'URDF_PARSE';
}

export interface DanglingJoint {
  joint: string;
  missing: string[];
}

/**
 * A joint names a link that does not exist.
 */
export class GraphIntegrityError extends RobotToolsError {
  readonly code = 'GRAPH_INTEGRITY';

  constructor(readonly dangling: DanglingJoint[]) {
    const detail = dangling
      .map((entry) => `${entry.joint} -> ${entry.missing.join(', ')}`)
      .join('; ');
    super(`Joints reference missing links: ${detail}`);
  }
}

export class ConfigError extends RobotToolsError {
  readonly code = 'CONFIG';
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
