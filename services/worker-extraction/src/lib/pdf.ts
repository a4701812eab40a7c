/**
 * Document Text Extraction
 *
 * Extracts page text from PDF files with pdfjs-dist; plain-text files are
 * read as a single page. Problems are reported in the result's error list
 * rather than thrown, so the pipeline can carry on with what it has.
 */

import fs from 'fs';
import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import { logger, type PageText, type TextExtractionResult } from '@finspread/shared';
import type { TextExtractor } from './pipeline';

pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

const TEXT_EXTENSIONS = new Set(['.txt', '.text']);

// Horizontal gap (in PDF units) that separates two table cells
const COLUMN_GAP = 6;

interface PositionedText {
  x: number;
  width: number;
  str: string;
}

/** Items closer than COLUMN_GAP join with one space, cells with two. */
function joinLine(items: readonly PositionedText[]): string {
  let line = '';
  let previousEnd: number | null = null;
  for (const item of items) {
    const text = item.str.trim();
    if (previousEnd !== null) {
      line += item.x - previousEnd >= COLUMN_GAP ? '  ' : ' ';
    }
    line += text;
    previousEnd = item.x + item.width;
  }
  return line.trim();
}

/**
 * Extract text from a PDF file, preserving line structure.
 *
 * Items are grouped by Y position so statement rows keep their label and
 * figures on one line, which the layout table detector relies on.
 */
export async function extractTextFromPdf(filePath: string): Promise<PageText[]> {
  const data = new Uint8Array(fs.readFileSync(filePath));
  const pdf = await pdfjsLib.getDocument({ data }).promise;

  const pages: PageText[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, PositionedText[]>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Text on the same visual line may have slight Y variations
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, width: item.width, str: item.str });
        itemsByY.set(y, line);
      }

      // Top to bottom
      const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

      const lines: string[] = [];
      for (const y of sortedYPositions) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = joinLine(lineItems);
        if (lineText) {
          lines.push(lineText);
        }
      }

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }
  } finally {
    await pdf.destroy();
  }

  return pages;
}

export class FileTextExtractor implements TextExtractor {
  async extract(filePath: string): Promise<TextExtractionResult> {
    const result: TextExtractionResult = { pages: [], totalPages: 0, errors: [] };

    if (!fs.existsSync(filePath)) {
      result.errors.push(`File not found: ${filePath}`);
      return result;
    }

    const extension = path.extname(filePath).toLowerCase();

    try {
      if (extension === '.pdf') {
        result.pages = await extractTextFromPdf(filePath);
      } else if (TEXT_EXTENSIONS.has(extension)) {
        result.pages = [{ pageNumber: 1, text: fs.readFileSync(filePath, 'utf-8') }];
      } else {
        result.errors.push(`Unsupported file type for text extraction: ${extension || 'none'}`);
        return result;
      }
    } catch (error) {
      const message = `Failed to extract text: ${error instanceof Error ? error.message : String(error)}`;
      logger.error(message, error, { file_path: filePath });
      result.errors.push(message);
      return result;
    }

    result.totalPages = result.pages.length;

    logger.info('Text extraction complete', {
      file_path: filePath,
      total_pages: result.totalPages,
      total_chars: result.pages.reduce((sum, p) => sum + p.text.length, 0),
    });

    return result;
  }
}
