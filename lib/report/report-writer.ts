// lib/report/report-writer.ts
// Writes a rendered report to a caller-supplied directory

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { OpportunityReport } from '../../types';
import { toMarkdown, toReportJson } from './report-renderer';

export type ReportFormat = 'markdown' | 'json';

export interface SaveReportOptions {
  format?: ReportFormat;
  filename?: string;
}

export function defaultReportFilename(report: OpportunityReport, format: ReportFormat = 'markdown'): string {
  return `opportunity_report_${report.report_id}.${format === 'json' ? 'json' : 'md'}`;
}

/**
 * Render and write the report, creating the directory when needed.
 * Resolves to the written file path.
 */
export async function saveReport(
  report: OpportunityReport,
  outputDir: string,
  options: SaveReportOptions = {}
): Promise<string> {
  const format = options.format ?? 'markdown';
  const filePath = path.join(outputDir, options.filename ?? defaultReportFilename(report, format));
  const content = format === 'json' ? toReportJson(report) : toMarkdown(report);

  await mkdir(outputDir, { recursive: true });
  await writeFile(filePath, content, 'utf-8');

  return filePath;
}
