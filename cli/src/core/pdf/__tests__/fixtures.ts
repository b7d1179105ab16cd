import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFArray, PDFDocument, PDFRawStream, PDFStream, decodePDFRawStream } from 'pdf-lib';

/** Width of fixture page n (1-based). Each page gets its own width so order can be asserted. */
export function pageWidth(n: number): number {
  return 100 + n;
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'page-extractor-'));
}

/** Write a PDF with `pageCount` pages of widths 101, 102, ..., each labelled "page n". */
export async function writeFixturePdf(path: string, pageCount: number): Promise<void> {
  const doc = await PDFDocument.create({ updateMetadata: false });
  for (let n = 1; n <= pageCount; n++) {
    const page = doc.addPage([pageWidth(n), 200]);
    page.drawText(`page ${n}`, { x: 10, y: 100, size: 12 });
  }
  writeFileSync(path, await doc.save());
}

/** Page widths of a PDF on disk, in page order. */
export async function readPageWidths(path: string): Promise<number[]> {
  const doc = await PDFDocument.load(readFileSync(path));
  return doc.getPages().map((page) => page.getWidth());
}

/** Expected widths for source pages first..last inclusive. */
export function widthsFor(first: number, last: number): number[] {
  const widths: number[] = [];
  for (let n = first; n <= last; n++) widths.push(pageWidth(n));
  return widths;
}

function streamBytes(stream: PDFStream): Uint8Array {
  return stream instanceof PDFRawStream ? decodePDFRawStream(stream).decode() : stream.getContents();
}

/** Decoded content stream(s) of each page, in page order. */
export async function readPageContents(path: string): Promise<string[]> {
  const doc = await PDFDocument.load(readFileSync(path));
  return doc.getPages().map((page) => {
    const contents = page.node.Contents();
    if (!contents) return '';

    const streams: PDFStream[] = [];
    if (contents instanceof PDFArray) {
      for (let i = 0; i < contents.size(); i++) streams.push(contents.lookup(i, PDFStream));
    } else {
      streams.push(contents);
    }
    return streams.map((s) => Buffer.from(streamBytes(s)).toString('latin1')).join('\n');
  });
}
