import { MalformedRecordError } from '../../domain/errors/LedgerReportError.js';
import { LedgerRecordMapper } from './LedgerRecordMapper.js';

describe('LedgerRecordMapper', () => {
  const mapper = new LedgerRecordMapper();

  test('maps invoices with sales line detail', () => {
    const [invoice] = mapper.mapInvoices([
      {
        Id: '130',
        TxnDate: '2025-02-14',
        TotalAmt: 1500,
        Balance: '250.00',
        CustomerRef: { value: '58', name: 'Harbor Cafe' },
        Line: [
          {
            Id: '1',
            Amount: 1500,
            DetailType: 'SalesItemLineDetail',
            SalesItemLineDetail: { ItemRef: { value: '2', name: 'Catering' } },
          },
          { Amount: 1500, DetailType: 'SubTotalLineDetail', SubTotalLineDetail: {} },
        ],
      },
    ]);

    expect(invoice).toEqual({
      kind: 'invoice',
      id: '130',
      counterparty: 'Harbor Cafe',
      txnDate: '2025-02-14',
      totalAmount: 1500,
      balance: 250,
      lines: [
        {
          id: '1',
          amount: 1500,
          description: undefined,
          detail: { kind: 'sales', itemRef: { value: '2', name: 'Catering' } },
        },
      ],
    });
  });

  test('prefers account-based detail on bills', () => {
    const [bill] = mapper.mapBills([
      {
        Id: '77',
        TotalAmt: '420.50',
        VendorRef: { name: 'City Power' },
        Line: [
          {
            Id: '1',
            Amount: 420.5,
            AccountBasedExpenseLineDetail: { AccountRef: { value: '7', name: 'Utilities' } },
            ItemBasedExpenseLineDetail: { ItemRef: { name: 'Meter' } },
          },
          { Id: '2', Amount: 12, ItemBasedExpenseLineDetail: { ItemRef: { name: 'Cable' } } },
          { Id: '3', DetailType: 'AccountBasedExpenseLineDetail' },
        ],
      },
    ]);

    expect(bill.counterparty).toBe('City Power');
    expect(bill.totalAmount).toBe(420.5);
    expect(bill.balance).toBe(0);
    expect(bill.txnDate).toBeNull();
    expect(bill.lines.map((line) => [line.amount, line.detail])).toEqual([
      [420.5, { kind: 'account-expense', accountRef: { value: '7', name: 'Utilities' } }],
      [12, { kind: 'item-expense', itemRef: { value: undefined, name: 'Cable' } }],
      [0, { kind: 'account-expense', accountRef: null }],
    ]);
  });

  test('ignores expense detail on invoice lines', () => {
    const [invoice] = mapper.mapInvoices([
      {
        Id: '5',
        TotalAmt: 10,
        Line: [{ Amount: 10, AccountBasedExpenseLineDetail: { AccountRef: { name: 'Rent' } } }],
      },
    ]);

    expect(invoice.lines[0].detail).toEqual({ kind: 'none' });
  });

  test('maps accounts with their type tag', () => {
    expect(
      mapper.mapAccounts([
        { Id: '35', Name: 'Checking', CurrentBalance: 1201, AccountType: 'Bank', AccountSubType: 'Checking', Active: true },
        { Id: '36', CurrentBalance: 0, AccountType: null },
      ]),
    ).toEqual([
      { id: '35', name: 'Checking', currentBalance: 1201, accountType: 'Bank', accountSubType: 'Checking', active: true },
      { id: '36', name: 'Unknown Account', currentBalance: 0, accountType: null, accountSubType: undefined, active: undefined },
    ]);
  });

  test('rejects a document without a total', () => {
    const error = (() => {
      try {
        mapper.mapBills([{ Id: '12', Line: [] }]);
        return null;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(MalformedRecordError);
    if (error instanceof MalformedRecordError) {
      expect(error.entity).toBe('Bill');
      expect(error.recordId).toBe('12');
      expect(error.issues.map((issue) => issue.path)).toEqual(['TotalAmt']);
    }
  });

  test('rejects an account without a balance', () => {
    expect(() => mapper.mapAccounts([{ Id: '9', Name: 'Savings', AccountType: 'Bank' }])).toThrow(MalformedRecordError);
  });

  test('rejects a record that is not an object', () => {
    expect(() => mapper.mapInvoices(['not a record'])).toThrow('Invoice (no id) is malformed');
  });
});
