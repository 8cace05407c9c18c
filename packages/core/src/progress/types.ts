/**
 * One record from curl's progress meter.
 *
 * Every field is curl's own display string (e.g. "1024k", "00:01:02");
 * nothing is converted to numbers. A field curl did not print is ''.
 */
export interface ProgressSample {
  /** Column 0: % of total */
  totalPercent: string;
  /** Column 1: total size */
  totalSize: string;
  /** Column 2: % received */
  receivedPercent: string;
  /** Column 3: received size */
  receivedSize: string;
  /** Column 4: % transferred (uploaded) */
  transferredPercent: string;
  /** Column 5: transferred size */
  transferredSize: string;
  /** Column 6: average download speed */
  avgDownloadRate: string;
  /** Column 7: average upload speed */
  avgUploadRate: string;
  /** Column 8: total time */
  totalTime: string;
  /** Column 9: time spent */
  elapsedTime: string;
  /** Column 10: time left */
  remainingTime: string;
  /** Column 11: current speed */
  currentRate: string;
}
