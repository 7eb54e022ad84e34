import { google, sheets_v4 } from 'googleapis';
import { logger, maskSender } from '../../core/observability/logging';
import { SheetsConfig } from '../../core/config';
import { FEEDBACK_HEADER, FeedbackRecord, FeedbackStore } from './feedback.types';
import { toFeedbackRow } from './feedback.utils';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export function createSheetsClient(config: SheetsConfig): sheets_v4.Sheets {
  const auth = new google.auth.JWT({
    email: config.clientEmail,
    key: config.privateKey,
    scopes: [SHEETS_SCOPE],
  });
  return google.sheets({ version: 'v4', auth });
}

/** "Feedback!A:C" -> "Feedback!A1:C1" */
export function headerRangeFor(range: string): string {
  const bang = range.lastIndexOf('!');
  const sheet = bang === -1 ? '' : range.slice(0, bang + 1);
  const columns = (bang === -1 ? range : range.slice(bang + 1)).split(':');
  const first = columns[0].replace(/\d+$/, '');
  const last = (columns[1] ?? columns[0]).replace(/\d+$/, '');
  return `${sheet}${first}1:${last}1`;
}

export class SheetsFeedbackStore implements FeedbackStore {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    private readonly range: string,
  ) {}

  async append(record: FeedbackRecord): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: this.range,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: {
        values: [toFeedbackRow(record)],
      },
    });
    logger.info({ phone: maskSender(record.senderId) }, "Appended feedback row");
  }

  /**
   * Writes the column header when the sheet's first row is empty.
   * Returns true when the header was written.
   */
  async ensureHeader(): Promise<boolean> {
    const headerRange = headerRangeFor(this.range);
    const existing = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: headerRange,
    });

    const firstRow = existing.data.values?.[0] ?? [];
    if (firstRow.length > 0) {
      return false;
    }

    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: headerRange,
      valueInputOption: 'RAW',
      requestBody: {
        values: [[...FEEDBACK_HEADER]],
      },
    });
    logger.info({ range: headerRange }, "Wrote feedback sheet header");
    return true;
  }
}
