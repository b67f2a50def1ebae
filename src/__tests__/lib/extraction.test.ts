import { Document, Packer, Paragraph } from 'docx';
import ExcelJS from 'exceljs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { describeNumbers, extractDocumentText, fileExtension, summarizeTable } from '../../lib/extraction';

async function buildWorkbook(): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Hiring');
  sheet.addRow(['region', 'score', 'hires']);
  for (let index = 1; index <= 10; index += 1) {
    sheet.addRow([`R${index}`, index, index * 2]);
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

function buildPdf(text: string): Buffer {
  const stream = `BT /F1 12 Tf 72 712 Td (${text}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, 'latin1');
}

describe('describeNumbers', () => {
  it('reports sample statistics with interpolated quartiles', () => {
    expect(describeNumbers([10, 9, 8, 7, 6, 5, 4, 3, 2, 1])).toBe(
      'count=10, mean=5.5, std=3.03, min=1, 25%=3.25, 50%=5.5, 75%=7.75, max=10'
    );
  });

  it('reports NaN for the deviation of a single value', () => {
    expect(describeNumbers([4])).toBe('count=1, mean=4, std=NaN, min=4, 25%=4, 50%=4, 75%=4, max=4');
  });
});

describe('summarizeTable', () => {
  it('omits the statistics block when no column is numeric', () => {
    const summary = summarizeTable({ columns: ['name'], rows: [['Ada'], ['Grace']] });
    expect(summary).toBe(
      ['Data Summary:', 'Shape: 2 rows, 1 columns', 'Columns: name', '', 'Sample Data:', 'name', 'Ada', 'Grace'].join('\n')
    );
  });
});

describe('fileExtension', () => {
  it('lower-cases the last extension', () => {
    expect(fileExtension('Report.Final.XLSX')).toBe('xlsx');
    expect(fileExtension('README')).toBe('');
  });
});

describe('extractDocumentText', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('summarizes a spreadsheet with shape, sample rows and numeric statistics', async () => {
    const result = await extractDocumentText(await buildWorkbook(), 'hiring.xlsx');
    const lines = result.text.split('\n');

    expect(result.error).toBeUndefined();
    expect(lines.slice(0, 7)).toEqual([
      'Data Summary:',
      'Shape: 10 rows, 3 columns',
      'Columns: region, score, hires',
      '',
      'Sample Data:',
      'region | score | hires',
      'R1 | 1 | 2',
    ]);
    expect(lines.slice(-4)).toEqual([
      '',
      'Numeric Statistics:',
      'score: count=10, mean=5.5, std=3.03, min=1, 25%=3.25, 50%=5.5, 75%=7.75, max=10',
      'hires: count=10, mean=11, std=6.06, min=2, 25%=6.5, 50%=11, 75%=15.5, max=20',
    ]);
  });

  it('summarizes CSV uploads the same way', async () => {
    const csv = Buffer.from('team,openings\nalpha,10\nbeta,20\n', 'utf-8');
    const result = await extractDocumentText(csv, 'openings.csv');

    expect(result.text).toContain('Shape: 2 rows, 2 columns');
    expect(result.text).toContain('openings: count=2, mean=15, std=7.07, min=10, 25%=12.5, 50%=15, 75%=17.5, max=20');
  });

  it('reads plain text as UTF-8', async () => {
    const result = await extractDocumentText(Buffer.from('Café hiring notes', 'utf-8'), 'notes.txt');
    expect(result).toEqual({ text: 'Café hiring notes' });
  });

  it('reads the text of a Word document', async () => {
    const document = new Document({
      sections: [{ children: [new Paragraph('Quarterly hiring rose by a third.')] }],
    });
    const result = await extractDocumentText(await Packer.toBuffer(document), 'brief.docx');

    expect(result.error).toBeUndefined();
    expect(result.text).toContain('Quarterly hiring rose by a third.');
  });

  it('reads the text of a PDF', async () => {
    const result = await extractDocumentText(buildPdf('Hiring rose in March'), 'report.pdf');

    expect(result.error).toBeUndefined();
    expect(result.text.trim()).toBe('Hiring rose in March');
  });

  it('reports a corrupt PDF as an error message', async () => {
    const result = await extractDocumentText(Buffer.from('%PDF-1.4 truncated'), 'broken.pdf');

    expect(result).toEqual({ text: '', error: 'Error processing file: Invalid PDF structure' });
  });

  it('rejects unsupported extensions without throwing', async () => {
    expect(await extractDocumentText(Buffer.from('x'), 'legacy.xls')).toEqual({
      text: '',
      error: 'Unsupported file type: xls',
    });
    expect(await extractDocumentText(Buffer.from('x'), 'README')).toEqual({
      text: '',
      error: 'Unsupported file type: unknown',
    });
  });

  it('turns reader failures into an error message', async () => {
    const result = await extractDocumentText(Buffer.from('not a workbook'), 'broken.xlsx');

    expect(result.text).toBe('');
    expect(result.error?.startsWith('Error processing file: ')).toBe(true);
  });
});
