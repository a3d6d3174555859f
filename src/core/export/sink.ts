// src/core/export/sink.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { HarvestError, ErrorCode, describeError } from '../errors.js';
import type { CapturedItem } from '../types/index.js';
import { formatCsvHeader, formatCsvRecord, formatJsonLine, toOutputRecord } from './record.js';

export interface SinkPaths {
  csvPath: string;
  jsonlPath: string;
}

/**
 * Append-only CSV + JSONL writer. Each record is one append per stream
 * followed by fsync; a failed append is truncated away from both files.
 */
export class PersistenceSink {
  private constructor(
    private csv: fs.FileHandle,
    private jsonl: fs.FileHandle
  ) {}

  static async open(paths: SinkPaths): Promise<PersistenceSink> {
    await fs.mkdir(path.dirname(path.resolve(paths.csvPath)), { recursive: true });
    await fs.mkdir(path.dirname(path.resolve(paths.jsonlPath)), { recursive: true });

    const csv = await fs.open(paths.csvPath, 'a');
    let jsonl: fs.FileHandle;
    try {
      const { size } = await csv.stat();
      if (size === 0) {
        await csv.write(formatCsvHeader());
        await csv.sync();
      }
      jsonl = await fs.open(paths.jsonlPath, 'a');
    } catch (error) {
      await csv.close();
      throw new HarvestError(
        ErrorCode.EXPORT_FAILED,
        `Failed to open outputs: ${describeError(error)}`,
        false,
        `Check permissions for ${paths.csvPath} and ${paths.jsonlPath}`
      );
    }

    return new PersistenceSink(csv, jsonl);
  }

  /** Writes the record to both streams, or to neither. */
  async appendRecord(item: CapturedItem): Promise<void> {
    const record = toOutputRecord(item);
    const csvRow = formatCsvRecord(record);
    const jsonLine = formatJsonLine(record);

    const [csvStat, jsonlStat] = await Promise.all([this.csv.stat(), this.jsonl.stat()]);
    try {
      await this.csv.write(csvRow);
      await this.csv.sync();
      await this.jsonl.write(jsonLine);
      await this.jsonl.sync();
    } catch (error) {
      await this.rollback(this.csv, csvStat.size);
      await this.rollback(this.jsonl, jsonlStat.size);
      throw new HarvestError(
        ErrorCode.EXPORT_FAILED,
        `Failed to append ${item.id}: ${describeError(error)}`,
        true
      );
    }
  }

  async close(): Promise<void> {
    await Promise.all([this.csv.close(), this.jsonl.close()]);
  }

  private async rollback(handle: fs.FileHandle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
      await handle.sync();
    } catch (error) {
      console.error(`[WARN] Failed to roll back a partial record: ${describeError(error)}`);
    }
  }
}
