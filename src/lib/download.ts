import { saveAs } from 'file-saver';

import { EXPORT_FILE_PREFIX } from './config';
import { fileStamp } from './format';
import { buildReportWorkbook, writeReportWorkbook } from './report';
import type { Snapshot } from './types';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const reportFileName = (now: Date) => `${EXPORT_FILE_PREFIX.report}_${fileStamp(now)}.xlsx`;
export const summaryFileName = (now: Date) => `${EXPORT_FILE_PREFIX.summary}_${fileStamp(now)}.md`;

export function downloadReportXlsx(s: Snapshot, summary: string, now: Date): string {
  const bytes = writeReportWorkbook(buildReportWorkbook(s, summary));
  const filename = reportFileName(now);
  saveAs(new Blob([bytes], { type: XLSX_MIME }), filename);
  return filename;
}

export function downloadSummaryMarkdown(summary: string, now: Date): string {
  const filename = summaryFileName(now);
  saveAs(new Blob([summary], { type: 'text/markdown;charset=utf-8' }), filename);
  return filename;
}
