/**
 * Incremental parser for curl's progress meter.
 *
 * curl writes its meter to stderr as carriage-return framed lines. Chunks
 * arrive with arbitrary boundaries, so the parser keeps whatever follows the
 * last complete `\r...\r` record and waits for more.
 *
 * @module progress-parser
 */

import type { ProgressSample } from './types.js';

/** Column order of curl's meter. Position is the only contract. */
const COLUMNS: ReadonlyArray<keyof ProgressSample> = [
  'totalPercent',
  'totalSize',
  'receivedPercent',
  'receivedSize',
  'transferredPercent',
  'transferredSize',
  'avgDownloadRate',
  'avgUploadRate',
  'totalTime',
  'elapsedTime',
  'remainingTime',
  'currentRate',
];

const RECORD_DELIMITER = '\r';

/**
 * Parse one record payload (the text between two carriage returns).
 * Missing trailing columns become ''; extra columns are ignored.
 */
export function parseProgressRecord(payload: string): ProgressSample {
  const trimmed = payload.trim();
  const fields = trimmed.length > 0 ? trimmed.split(/\s+/) : [];

  const sample: ProgressSample = {
    totalPercent: '',
    totalSize: '',
    receivedPercent: '',
    receivedSize: '',
    transferredPercent: '',
    transferredSize: '',
    avgDownloadRate: '',
    avgUploadRate: '',
    totalTime: '',
    elapsedTime: '',
    remainingTime: '',
    currentRate: '',
  };

  COLUMNS.forEach((column, index) => {
    sample[column] = fields[index] ?? '';
  });

  return sample;
}

/** Render a sample as the single-line progress report */
export function formatProgressLine(sample: ProgressSample): string {
  return `Progress: ${sample.totalPercent}% (Rate: ${sample.currentRate}/s, Estimated time remaining: ${sample.remainingTime})`;
}

/**
 * Stateful `\r`-framed record extractor.
 *
 * @example
 * ```ts
 * const parser = new ProgressStreamParser();
 * parser.feed('\r 12 1024 5 50');        // [] (no closing \r yet)
 * parser.feed(' 8 80 1k 0 00:01 00:00 00:01 2k\r'); // [sample]
 * parser.feed(' 13 1024 6 60 8 80 1k 0 00:01 00:00 00:01 2k\r'); // [sample]
 * ```
 */
export class ProgressStreamParser {
  private buffer = '';

  /** Bytes held back waiting for a closing delimiter */
  get pending(): string {
    return this.buffer === RECORD_DELIMITER ? '' : this.buffer;
  }

  /**
   * Append a chunk and return every record it completes, in order.
   *
   * curl opens every meter update with a single `\r`, so a record's closing
   * delimiter is left in the buffer as the opening one of the next. Text
   * before the first delimiter (curl's column headings) is dropped.
   * Records that are blank after trimming are consumed without a sample.
   */
  feed(chunk: string): ProgressSample[] {
    if (chunk.length === 0) {
      return [];
    }

    this.buffer += chunk;
    const samples: ProgressSample[] = [];
    let consumed = 0;

    for (;;) {
      const open = this.buffer.indexOf(RECORD_DELIMITER, consumed);
      if (open === -1) break;

      const close = this.buffer.indexOf(RECORD_DELIMITER, open + 1);
      if (close === -1) break;

      const payload = this.buffer.slice(open + 1, close);
      if (payload.trim().length > 0) {
        samples.push(parseProgressRecord(payload));
      }
      consumed = close;
    }

    if (consumed > 0) {
      this.buffer = this.buffer.slice(consumed);
    }

    return samples;
  }

  /** Drop any buffered partial record */
  reset(): void {
    this.buffer = '';
  }
}
