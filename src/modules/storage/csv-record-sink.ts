// ===========================================
// MODULE: MENTION ARCHIVE
// Append-only CSV file per monitor session
// ===========================================

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { shortAddress } from '../../utils/format.js';
import type { MentionRecord, RecordSink } from '../../types/index.js';

export const CSV_HEADER = 'id,username,text,date,likes,replies,retweets,url,verified';

export function sessionFileName(token: string, sessionStart: number): string {
  return `monitor_${token}_${Math.floor(sessionStart / 1000)}.csv`;
}

export function csvField(value: string | number | boolean): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(record: MentionRecord): string {
  return [
    record.id,
    record.author,
    record.text,
    record.timestamp.toISOString(),
    record.likeCount,
    record.replyCount,
    record.repostCount,
    record.permalink,
    record.authorVerified,
  ].map(csvField).join(',');
}

export class CsvRecordSink implements RecordSink {
  private directoryReady: Promise<void> | null = null;

  constructor(private readonly directory: string) {}

  filePath(token: string, sessionStart: number): string {
    return path.join(this.directory, sessionFileName(token, sessionStart));
  }

  async append(token: string, sessionStart: number, records: MentionRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.ensureDirectory();

    const file = this.filePath(token, sessionStart);
    const writeHeader = !(await exists(file));
    const lines = records.map(toCsvRow);
    if (writeHeader) lines.unshift(CSV_HEADER);

    await fs.appendFile(file, `${lines.join('\n')}\n`, 'utf8');
    logger.debug({ token: shortAddress(token), file, count: records.length }, 'Saved mention batch');
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = fs.mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = null;
          throw error;
        }
      );
    }
    return this.directoryReady;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
