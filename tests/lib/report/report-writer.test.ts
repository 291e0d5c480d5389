// tests/lib/report/report-writer.test.ts

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { toMarkdown } from '../../../lib/report/report-renderer';
import { defaultReportFilename, saveReport } from '../../../lib/report/report-writer';
import { buildReport } from '../../helpers/report-fixtures';

describe('saveReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'opportunity-report-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test('default filename per format', () => {
    const report = buildReport();
    expect(defaultReportFilename(report)).toBe('opportunity_report_rpt-1.md');
    expect(defaultReportFilename(report, 'json')).toBe('opportunity_report_rpt-1.json');
  });

  test('writes the markdown document and returns its path', async () => {
    const report = buildReport();
    const filePath = await saveReport(report, tempDir);

    expect(filePath).toBe(path.join(tempDir, 'opportunity_report_rpt-1.md'));
    expect(await readFile(filePath, 'utf-8')).toBe(toMarkdown(report));
  });

  test('writes JSON into a nested directory it creates', async () => {
    const outputDir = path.join(tempDir, 'reports', '2026');
    const filePath = await saveReport(buildReport(), outputDir, { format: 'json', filename: 'chair.json' });

    expect(filePath).toBe(path.join(outputDir, 'chair.json'));
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(parsed).toMatchObject({ report_id: 'rpt-1', margin_analysis: { margin_percent: 35 } });
  });

  test('rejects when the directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    await writeFile(blocker, 'x');

    await expect(saveReport(buildReport(), path.join(blocker, 'out'))).rejects.toThrow();
  });
});
