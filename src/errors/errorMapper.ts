import { ErrorCode, SourceOp } from '../types/enums.js';
import { SourceError } from './SourceError.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);
const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const INVALID_PATH_CODES = new Set(['ENAMETOOLONG', 'EINVAL']);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function mapFsError(err: unknown, op: SourceOp, path: string): SourceError {
  const code = errnoCode(err);
  let mapped: ErrorCode = ErrorCode.UNKNOWN;
  if (code) {
    if (NOT_FOUND_CODES.has(code)) mapped = ErrorCode.NOT_FOUND;
    else if (PERMISSION_CODES.has(code)) mapped = ErrorCode.PERMISSION_DENIED;
    else if (INVALID_PATH_CODES.has(code)) mapped = ErrorCode.INVALID_PATH;
    else mapped = ErrorCode.IO_ERROR;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new SourceError(mapped, detail, { op, path, cause: err });
}
