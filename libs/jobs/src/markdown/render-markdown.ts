import { ExtractedTable, JobResult } from '@docextract/task-store';
import { ExtractedPage, ExtractedPageTable } from '../extraction/extraction-provider';

const PAGE_SEPARATOR = '---';

/**
 * Renders extracted pages as one Markdown document and flattens their
 * tables into page-tagged records.
 *
 * Layout per page: the page text, then each table under
 * `## Table {n} (Page {p})`. Pages are separated by a `---` rule. An
 * extraction with no text and no tables renders as the empty string.
 */
export function renderMarkdown(pages: ExtractedPage[]): JobResult {
  const blocks: string[] = [];
  const tables: ExtractedTable[] = [];

  pages.forEach((page, pageIndex) => {
    const pageNumber = pageIndex + 1;
    const parts: string[] = [];

    const text = page.text.trim();
    if (text.length > 0) {
      parts.push(text);
    }

    page.tables.forEach((table, tableIndex) => {
      if (table.headers.length === 0) return;

      const normalized = normalizeTable(table);
      tables.push({ page: pageNumber, ...normalized });
      parts.push(
        [
          `## Table ${tableIndex + 1} (Page ${pageNumber})`,
          '',
          renderTable(normalized),
        ].join('\n'),
      );
    });

    if (parts.length > 0) {
      blocks.push(parts.join('\n\n'));
    }
  });

  const markdown =
    blocks.length > 0 ? `${blocks.join(`\n\n${PAGE_SEPARATOR}\n\n`)}\n` : '';
  return { markdown, tables };
}

function normalizeTable(table: ExtractedPageTable): ExtractedPageTable {
  const width = table.headers.length;
  return {
    headers: table.headers.map(cleanCell),
    rows: table.rows.map((row) => {
      const cells = row.slice(0, width).map(cleanCell);
      while (cells.length < width) cells.push('');
      return cells;
    }),
  };
}

function renderTable(table: ExtractedPageTable): string {
  const line = (cells: string[]) => `|${cells.map(escapeCell).join('|')}|`;
  return [
    line(table.headers),
    line(table.headers.map(() => '---')),
    ...table.rows.map(line),
  ].join('\n');
}

function cleanCell(value: string): string {
  return value.replace(/\r?\n/g, ' ').trim();
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}
