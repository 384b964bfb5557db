import { appendFile, mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

import { KeyedLock } from '../utils/keyedLock.js';
import { logger } from '../utils/logger.js';

export interface HistoryRecord {
  scenario: string;
  timestamp: Date;
  participantIds: string[];
  spectatorIds: string[];
  attendedIds: string[];
}

export interface HistorySink {
  append(record: HistoryRecord): Promise<void>;
}

export const HISTORY_HEADER = ['scenario', 'timestamp', 'participant-ids', 'spectator-ids', 'attended-ids'];

const EMPTY_LIST = '-';

export const formatIdList = (ids: readonly string[]): string => (ids.length > 0 ? ids.join(',') : EMPTY_LIST);

const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const toCsvRow = (fields: readonly string[]): string => `${fields.map(escapeCsvField).join(',')}\n`;

export const toHistoryRow = (record: HistoryRecord): string =>
  toCsvRow([
    record.scenario,
    record.timestamp.toISOString(),
    formatIdList(record.participantIds),
    formatIdList(record.spectatorIds),
    formatIdList(record.attendedIds)
  ]);

const isMissingOrEmpty = async (filePath: string): Promise<boolean> => {
  try {
    const info = await stat(filePath);
    return info.size === 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
};

/** Append-only CSV log of registered sessions; the header is written with the first row. */
export class CsvHistoryWriter implements HistorySink {
  private readonly lock = new KeyedLock();

  constructor(private readonly filePath: string) {}

  append(record: HistoryRecord): Promise<void> {
    return this.lock.run(this.filePath, async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      const header = (await isMissingOrEmpty(this.filePath)) ? toCsvRow(HISTORY_HEADER) : '';
      await appendFile(this.filePath, header + toHistoryRow(record), 'utf8');
      logger.info('History record appended', {
        file: this.filePath,
        scenario: record.scenario,
        attended: record.attendedIds.length
      });
    });
  }
}
