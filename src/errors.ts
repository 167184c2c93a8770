import chalk from 'chalk';

export class CokacencError extends Error {
  constructor(
    message: string,
    public code: string,
    public suggestions?: string[]
  ) {
    super(message);
    this.name = 'CokacencError';
  }
}

export class FormatError extends CokacencError {
  constructor(message: string) {
    super(`Invalid chunk format: ${message}`, 'FORMAT_ERROR', [
      'Check that the file was produced by cokacenc v2',
      'v1 encrypted files are not compatible with this version',
    ]);
    this.name = 'FormatError';
  }
}

export class CryptoError extends CokacencError {
  constructor(message: string) {
    super(`Decryption failed: ${message}`, 'CRYPTO_ERROR', [
      'Use the same key file that was used for pack',
      'The chunk file may be corrupted',
    ]);
    this.name = 'CryptoError';
  }
}

export class SeqOverflowError extends CokacencError {
  constructor(public index: number) {
    super(`Chunk index ${index} exceeds the maximum of 456975 (zzzz)`, 'SEQ_OVERFLOW', [
      'Use a larger --size so the file splits into fewer chunks',
    ]);
    this.name = 'SeqOverflowError';
  }
}

export class MissingChunkError extends CokacencError {
  constructor(
    public groupId: string,
    public expectedLabel: string
  ) {
    super(`Missing chunk ${groupId}_${expectedLabel} in group ${groupId}`, 'MISSING_CHUNK', [
      'Make sure every chunk file of the group is in the directory',
    ]);
    this.name = 'MissingChunkError';
  }
}

export class MetadataInconsistencyError extends CokacencError {
  constructor(message: string) {
    super(`Chunk metadata error: ${message}`, 'METADATA_INCONSISTENCY', [
      'Chunks from different pack runs may have been mixed',
      'The chunk file may be corrupted',
    ]);
    this.name = 'MetadataInconsistencyError';
  }
}

export class IncompleteMetadataError extends CokacencError {
  constructor(received: number) {
    super(
      `Chunk ended before its metadata record was complete (${received} byte(s) received)`,
      'INCOMPLETE_METADATA',
      ['The chunk file may be truncated or corrupted']
    );
    this.name = 'IncompleteMetadataError';
  }
}

export class IntegrityError extends CokacencError {
  constructor(
    message: string,
    public expected: string,
    public actual: string
  ) {
    super(`Integrity check failed: ${message} (expected ${expected}, got ${actual})`, 'INTEGRITY_ERROR', [
      'One or more chunk files are corrupted',
    ]);
    this.name = 'IntegrityError';
  }
}

export class IoError extends CokacencError {
  constructor(
    public path: string,
    operation: string,
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot ${operation} ${path}${detail}`, 'IO_ERROR', [
      'Check that the path exists and has the right permissions',
    ]);
    this.name = 'IoError';
  }
}

export class ConfigError extends CokacencError {
  constructor(message: string, suggestions?: string[]) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', suggestions);
    this.name = 'ConfigError';
  }
}

export class GroupIdExhaustedError extends ConfigError {
  constructor(attempts: number) {
    super(`Could not generate a unique group id after ${attempts} attempts`, [
      'Move existing chunk files out of the directory and retry',
    ]);
    this.code = 'GROUP_ID_EXHAUSTED';
    this.name = 'GroupIdExhaustedError';
  }
}

/**
 * Wrap a filesystem failure unless it is already one of ours
 */
export const toIoError = (error: unknown, path: string, operation: string): CokacencError => {
  if (error instanceof CokacencError) {
    return error;
  }
  return new IoError(path, operation, error);
};

export const handleError = (error: unknown): never => {
  if (error instanceof CokacencError) {
    console.error(chalk.red('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(chalk.dim('Suggestions:'));
      error.suggestions.forEach((s) => console.error(chalk.dim(`  → ${s}`)));
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
  process.exit(1);
};
