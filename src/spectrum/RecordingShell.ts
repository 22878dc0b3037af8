import type { DelimiterAnswer, ReportKind, ShellReport, SpectrumShell } from './types.js';

/**
 * Non-interactive shell for request/response surfaces.
 *
 * The delimiter prompt is answered with the delimiter supplied up front, or
 * declined when there is none. Reports are kept for the response and passed
 * to an optional listener (the request logger).
 */
export class RecordingShell implements SpectrumShell {
  readonly reports: ShellReport[] = [];
  private readonly delimiter: string | undefined;
  private readonly onReport: ((report: ShellReport) => void) | undefined;

  constructor(options: { delimiter?: string | undefined; onReport?: (report: ShellReport) => void } = {}) {
    this.delimiter = options.delimiter;
    this.onReport = options.onReport;
  }

  async promptDelimiter(_displayName: string): Promise<DelimiterAnswer> {
    if (this.delimiter === undefined) {
      return { delimiter: '', accepted: false };
    }
    return { delimiter: this.delimiter, accepted: true };
  }

  reportError(kind: ReportKind, message: string): void {
    const report = { kind, message };
    this.reports.push(report);
    this.onReport?.(report);
  }
}
