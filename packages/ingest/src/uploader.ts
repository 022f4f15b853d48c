/**
 * Sequential chunked upload of measurement records
 */

import { createLogger, DEFAULT_UPLOAD_CHUNK_SIZE, type Logger } from '@wearable/config';
import { UploadFailureError, type MeasurementRecord } from '@wearable/core';
import type { AnalyticsStore } from '@wearable/db';
import type { UploadResult } from './types.js';

/**
 * Split into ordered, non-overlapping chunks of at most `size` items
 */
export function chunkRecords<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

export interface UploadOptions {
  sessionId: string;
  chunkSize?: number;
  logger?: Logger;
}

/**
 * Write each chunk and wait for it before issuing the next.
 * The first failed chunk aborts; earlier chunks stay written.
 */
export async function uploadInChunks(
  records: readonly MeasurementRecord[],
  store: AnalyticsStore,
  options: UploadOptions
): Promise<UploadResult> {
  const { sessionId, chunkSize = DEFAULT_UPLOAD_CHUNK_SIZE, logger = createLogger('uploader') } = options;
  const chunks = chunkRecords(records, chunkSize);
  let rowsWritten = 0;

  for (const [index, chunk] of chunks.entries()) {
    try {
      await store.insertMeasurements(chunk);
    } catch (error) {
      logger.error(
        {
          event: 'ingest.upload.failed',
          sessionId,
          chunk: index + 1,
          chunkCount: chunks.length,
          rowsWritten,
          error: error instanceof Error ? error.message : String(error),
        },
        `  ✗ Upload failed at batch ${index + 1}/${chunks.length}`
      );
      throw new UploadFailureError(sessionId, index, chunks.length, rowsWritten, error);
    }

    rowsWritten += chunk.length;
    logger.info(
      { event: 'ingest.upload.chunk', sessionId, chunk: index + 1, chunkCount: chunks.length, rows: chunk.length },
      `  ✓ Uploaded batch ${index + 1}/${chunks.length} (${chunk.length.toLocaleString()} rows)`
    );
  }

  return { chunkCount: chunks.length, rowsWritten };
}
