import { formatDateTime, truncateCell } from '../core/text';
import type { Conversation } from '../core/types';

export const ID_COLUMN_WIDTH = 14;
export const DATE_COLUMN_WIDTH = 19;
export const MIN_MESSAGE_COLUMN_WIDTH = 10;
export const TABLE_HEIGHT = 15;
const TABLE_CHROME_WIDTH = 8;
const CELL_GAP = '  ';

export type ColumnWidths = {
  id: number;
  date: number;
  message: number;
};

export type TableRow = [id: string, date: string, message: string];

export function calculateColumnWidths(terminalWidth: number): ColumnWidths {
  const available = terminalWidth - TABLE_CHROME_WIDTH;
  return {
    id: ID_COLUMN_WIDTH,
    date: DATE_COLUMN_WIDTH,
    message: Math.max(MIN_MESSAGE_COLUMN_WIDTH, available - ID_COLUMN_WIDTH - DATE_COLUMN_WIDTH),
  };
}

export function buildConversationRow(conversation: Conversation, widths: ColumnWidths): TableRow {
  const message = conversation.message.replace(/\s+/g, ' ').trim();
  return [
    truncateCell(conversation.id, widths.id),
    truncateCell(formatDateTime(conversation.timestamp), widths.date),
    truncateCell(message, widths.message),
  ];
}

/** Cells padded to their column width and joined with a two-space gap. */
export function formatTableLine(cells: TableRow, widths: ColumnWidths): string {
  const [id, date, message] = cells;
  return [id.padEnd(widths.id), date.padEnd(widths.date), message.padEnd(widths.message)].join(
    CELL_GAP,
  );
}

/** First visible row index so that `cursor` stays on screen. */
export function visibleWindowStart(total: number, cursor: number, height = TABLE_HEIGHT): number {
  if (total <= height) {
    return 0;
  }
  return Math.min(total - height, Math.max(0, cursor - height + 1));
}
