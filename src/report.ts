/**
 * Plain-text and JSON rendering of dependency reports.
 */
import type { DependencyReport } from './types/dependency-report.js';

export type ReportFormat = 'text' | 'json';

export interface ReportOptions {
  readonly format: ReportFormat;
  /** Text only: include file size, hash, SONAME, RPATH and RUNPATH. */
  readonly details: boolean;
}

function detailLines(report: DependencyReport): string[] {
  return [
    `File: ${report.filename}`,
    `Size: ${report.totalSize} bytes`,
    `SHA256: ${report.sha256}`,
    `SONAME: ${report.soname ?? '(none)'}`,
    `RPATH: ${report.rpath ?? '(none)'}`,
    `RUNPATH: ${report.runpath ?? '(none)'}`,
    `Needed (${report.needed.length}):`,
    ...report.needed.map((name) => `  ${name}`),
  ];
}

/**
 * Renders a report as output lines.
 * Without details the text form is one library name per line, so an object with no DT_NEEDED entries prints nothing.
 */
export function formatReport(report: DependencyReport, options: ReportOptions): string[] {
  if (options.format === 'json') {
    return [JSON.stringify(report, null, 2)];
  }
  return options.details ? detailLines(report) : [...report.needed];
}
