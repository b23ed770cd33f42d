export enum NodeKind {
  FILE = 'FILE',
  DIR = 'DIR',
  SYMLINK = 'SYMLINK',
  SPECIAL = 'SPECIAL'
}

export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_PATH = 'INVALID_PATH',
  SHADOWED = 'SHADOWED',
  IS_DIRECTORY = 'IS_DIRECTORY',
  NOT_DIRECTORY = 'NOT_DIRECTORY',
  CLOSED = 'CLOSED',
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',
  INCONSISTENT_SOURCE = 'INCONSISTENT_SOURCE',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  IO_ERROR = 'IO_ERROR',
  UNKNOWN = 'UNKNOWN'
}

export enum SourceOp {
  OPEN = 'open',
  STAT = 'stat',
  READ = 'read',
  LIST = 'list',
  CLOSE = 'close'
}

export enum SourceSide {
  PRIMARY = 'primary',
  SECONDARY = 'secondary'
}
