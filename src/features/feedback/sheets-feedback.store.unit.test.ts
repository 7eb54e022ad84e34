import { sheets_v4 } from 'googleapis';
import { SheetsFeedbackStore, headerRangeFor } from './sheets-feedback.store';

jest.mock('../../core/observability/logging', () => ({
  logger: {
    info: jest.fn(),
  },
  maskSender: (senderId: string) => senderId.slice(-4),
}));

describe('SheetsFeedbackStore', () => {
  let append: jest.Mock;
  let get: jest.Mock;
  let update: jest.Mock;
  let store: SheetsFeedbackStore;

  beforeEach(() => {
    append = jest.fn().mockResolvedValue({ data: {} });
    get = jest.fn();
    update = jest.fn().mockResolvedValue({ data: {} });
    const sheets = { spreadsheets: { values: { append, get, update } } } as unknown as sheets_v4.Sheets;
    store = new SheetsFeedbackStore(sheets, 'sheet-123', 'Feedback!A:C');
  });

  it('appends the record as one row', async () => {
    await store.append({ senderId: '+1555', feedback: 'this was helpful', timestamp: '2025-03-01 09:05:07' });

    expect(append).toHaveBeenCalledTimes(1);
    expect(append).toHaveBeenCalledWith({
      spreadsheetId: 'sheet-123',
      range: 'Feedback!A:C',
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: {
        values: [['+1555', 'this was helpful', '2025-03-01 09:05:07']],
      },
    });
  });

  it('propagates API failures', async () => {
    append.mockRejectedValue(new Error('The caller does not have permission'));

    await expect(
      store.append({ senderId: '+1555', feedback: 'nice', timestamp: '2025-03-01 09:05:07' })
    ).rejects.toThrow('The caller does not have permission');
  });

  describe('ensureHeader', () => {
    it('writes the header into an empty sheet', async () => {
      get.mockResolvedValue({ data: { range: 'Feedback!A1:C1' } });

      await expect(store.ensureHeader()).resolves.toBe(true);
      expect(get).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', range: 'Feedback!A1:C1' });
      expect(update).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-123',
        range: 'Feedback!A1:C1',
        valueInputOption: 'RAW',
        requestBody: { values: [['Phone', 'Feedback', 'Time']] },
      });
    });

    it('leaves an existing header alone', async () => {
      get.mockResolvedValue({ data: { values: [['Phone', 'Feedback', 'Time']] } });

      await expect(store.ensureHeader()).resolves.toBe(false);
      expect(update).not.toHaveBeenCalled();
    });
  });
});

describe('headerRangeFor', () => {
  it.each([
    ['Feedback!A:C', 'Feedback!A1:C1'],
    ['A:C', 'A1:C1'],
    ['Sheet1!A2:C', 'Sheet1!A1:C1'],
    ["'My Sheet'!B:D", "'My Sheet'!B1:D1"],
  ])('maps %s to %s', (range, expected) => {
    expect(headerRangeFor(range)).toBe(expected);
  });
});
