/**
 * Error types raised by the ingestion pipeline
 */

export class DatasetNotFoundError extends Error {
  readonly baseDir: string;
  readonly tried: string[];

  constructor(baseDir: string, tried: string[]) {
    super(
      `Could not find dataset in ${baseDir}. ` +
        `Expected to find STRESS/, AEROBIC/, ANAEROBIC/ directories (tried: ${tried.join(', ')})`
    );
    this.name = 'DatasetNotFoundError';
    this.baseDir = baseDir;
    this.tried = tried;
  }
}

/**
 * A single signal file cannot be turned into records.
 * Recovered by skipping that file.
 */
export class DataQualityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataQualityError';
  }
}

export class UnparseableStartTimeError extends DataQualityError {
  readonly rawValue: string;

  constructor(rawValue: string) {
    super(`Cannot parse start time: ${rawValue}`);
    this.name = 'UnparseableStartTimeError';
    this.rawValue = rawValue;
  }
}

/**
 * A chunk write failed. Chunks written before it remain in the store.
 */
export class UploadFailureError extends Error {
  readonly sessionId: string;
  readonly chunkIndex: number;
  readonly chunkCount: number;
  readonly rowsWritten: number;

  constructor(
    sessionId: string,
    chunkIndex: number,
    chunkCount: number,
    rowsWritten: number,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Upload failed for ${sessionId} at batch ${chunkIndex + 1}/${chunkCount} ` +
        `(${rowsWritten} rows already written): ${reason}`,
      { cause }
    );
    this.name = 'UploadFailureError';
    this.sessionId = sessionId;
    this.chunkIndex = chunkIndex;
    this.chunkCount = chunkCount;
    this.rowsWritten = rowsWritten;
  }
}
