import { ErrorCode, SourceOp, SourceSide } from '../types/enums.js';

const NOT_FOUND_CODES = new Set<ErrorCode>([ErrorCode.NOT_FOUND, ErrorCode.INVALID_PATH, ErrorCode.SHADOWED]);

export interface SourceErrorInit {
  op: SourceOp;
  path: string;
  side?: SourceSide;
  cause?: unknown;
}

export class SourceError extends Error {
  readonly code: ErrorCode;
  readonly op: SourceOp;
  readonly path: string;
  readonly side?: SourceSide;

  constructor(code: ErrorCode, detail: string, init: SourceErrorInit) {
    const where = init.side ? `${init.path} (${init.side})` : init.path;
    super(`${init.op} ${where}: ${detail}`, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'SourceError';
    this.code = code;
    this.op = init.op;
    this.path = init.path;
    this.side = init.side;
  }
}

export class ShadowedPathError extends SourceError {
  readonly blockedBy: string;

  constructor(path: string, blockedBy: string) {
    super(ErrorCode.SHADOWED, `shadowed by non-directory ${blockedBy} in primary`, { op: SourceOp.OPEN, path });
    this.name = 'ShadowedPathError';
    this.blockedBy = blockedBy;
  }
}

export function notFound(op: SourceOp, path: string): SourceError {
  return new SourceError(ErrorCode.NOT_FOUND, 'file does not exist', { op, path });
}

export function invalidPath(op: SourceOp, path: string): SourceError {
  return new SourceError(ErrorCode.INVALID_PATH, 'invalid path', { op, path });
}

export function isNotFoundError(err: unknown): err is SourceError {
  return err instanceof SourceError && NOT_FOUND_CODES.has(err.code);
}

export function wrapSourceError(err: unknown, init: Required<Omit<SourceErrorInit, 'cause'>>): SourceError {
  if (err instanceof SourceError) {
    const original = err.code;
    const code = isNotFoundError(err) ? ErrorCode.INCONSISTENT_SOURCE : original;
    return new SourceError(code, err.message, { ...init, cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new SourceError(ErrorCode.IO_ERROR, detail, { ...init, cause: err });
}
