import { saveAs } from 'file-saver';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { loadSampleSnapshot } from './data';
import { downloadReportXlsx, downloadSummaryMarkdown } from './download';
import { readReportWorkbook } from './report';

vi.mock('file-saver', () => ({ saveAs: vi.fn() }));

const NOW = new Date(2025, 5, 16, 9, 5);

function savedBlob(): Blob {
  const [data] = vi.mocked(saveAs).mock.calls[0];
  if (!(data instanceof Blob)) throw new Error('expected a Blob to be saved');
  return data;
}

describe('Downloads', () => {
  beforeEach(() => {
    vi.mocked(saveAs).mockClear();
  });

  it('saves the summary as a timestamped markdown file', async () => {
    const name = downloadSummaryMarkdown('# Summary', NOW);

    expect(name).toBe('Supply_Chain_Summary_20250616_0905.md');
    expect(vi.mocked(saveAs)).toHaveBeenCalledWith(expect.any(Blob), name);
    expect(await savedBlob().text()).toBe('# Summary');
  });

  it('saves a workbook that reads back to the same snapshot', async () => {
    const s = loadSampleSnapshot();
    const name = downloadReportXlsx(s, 'summary text', NOW);

    expect(name).toBe('Supply_Chain_Report_20250616_0905.xlsx');
    const back = readReportWorkbook(await savedBlob().arrayBuffer());
    expect(back.snapshot).toEqual(s);
    expect(back.summary).toBe('summary text');
  });
});
