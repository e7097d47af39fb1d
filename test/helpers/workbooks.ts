import * as XLSX from 'xlsx';

export type SheetRows = Array<Array<string | number | boolean | Date | null>>;

export function buildWorkbook(sheets: Record<string, SheetRows>, edit?: (book: XLSX.WorkBook) => void): Buffer {
  const book = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), name);
  }
  edit?.(book);
  const written: Uint8Array = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  return Buffer.from(written);
}
