/**
 * Table Extraction
 *
 * Finds statement tables in the page text produced by the text stage.
 */

import { logger, detectLayoutTables, type PageText, type TableExtractionResult } from '@finspread/shared';
import type { TableExtractor } from './pipeline';

export class LayoutTableExtractor implements TableExtractor {
  async extract(filePath: string, pages: readonly PageText[]): Promise<TableExtractionResult> {
    if (pages.length === 0) {
      return { tables: [], errors: ['No page text available for table extraction'] };
    }

    const tables = detectLayoutTables(pages);

    logger.info('Table extraction complete', {
      file_path: filePath,
      tables_found: tables.length,
      pages_with_tables: new Set(tables.map((t) => t.page_number)).size,
    });

    return { tables, errors: [] };
  }
}
