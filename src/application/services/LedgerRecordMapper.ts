import { z } from 'zod';
import { Account } from '../../domain/entities/Account.js';
import { DocumentKind, EntityRef, LedgerDocument, LineDetail, TransactionLine } from '../../domain/entities/LedgerDocument.js';
import { MalformedRecordError } from '../../domain/errors/LedgerReportError.js';
import { coerceAmount, roundAmount } from '../../domain/services/Money.js';
import {
  AccountRecordSchema,
  BillRecordSchema,
  InvoiceRecordSchema,
  LineRecordDTO,
} from '../dto/LedgerRecordDTO.js';

// Summary rows repeat the sum of the lines above them and are not transaction lines.
const SUMMARY_DETAIL_TYPES = new Set(['SubTotalLineDetail']);

const toRef = (ref: { value?: string; name?: string } | null | undefined): EntityRef | null =>
  ref ? { value: ref.value, name: ref.name } : null;

const recordIdOf = (raw: unknown): string | null => {
  if (typeof raw === 'object' && raw !== null && 'Id' in raw) {
    const id = raw.Id;
    return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
  }

  return null;
};

const parseRecord = <Schema extends z.ZodTypeAny>(schema: Schema, entity: string, raw: unknown): z.output<Schema> => {
  const result = schema.safeParse(raw);

  if (!result.success) {
    throw new MalformedRecordError(
      entity,
      recordIdOf(raw),
      result.error.issues.map((issue) => ({ path: issue.path.join('.') || '(record)', message: issue.message })),
    );
  }

  return result.data;
};

const resolveRevenueDetail = (line: LineRecordDTO): LineDetail => {
  if (line.SalesItemLineDetail) {
    return { kind: 'sales', itemRef: toRef(line.SalesItemLineDetail.ItemRef) };
  }

  return line.DetailType === 'SalesItemLineDetail' ? { kind: 'sales', itemRef: null } : { kind: 'none' };
};

// Account-based detail is checked before item-based detail.
const resolveExpenseDetail = (line: LineRecordDTO): LineDetail => {
  if (line.AccountBasedExpenseLineDetail) {
    return { kind: 'account-expense', accountRef: toRef(line.AccountBasedExpenseLineDetail.AccountRef) };
  }

  if (line.ItemBasedExpenseLineDetail) {
    return { kind: 'item-expense', itemRef: toRef(line.ItemBasedExpenseLineDetail.ItemRef) };
  }

  switch (line.DetailType) {
    case 'AccountBasedExpenseLineDetail':
      return { kind: 'account-expense', accountRef: null };
    case 'ItemBasedExpenseLineDetail':
      return { kind: 'item-expense', itemRef: null };
    default:
      return { kind: 'none' };
  }
};

const mapLines = (lines: LineRecordDTO[] | undefined, kind: DocumentKind): TransactionLine[] =>
  (lines ?? [])
    .filter((line) => !(line.DetailType && SUMMARY_DETAIL_TYPES.has(line.DetailType)))
    .map((line): TransactionLine => ({
      id: line.Id,
      amount: coerceAmount(line.Amount),
      description: line.Description,
      detail: kind === 'invoice' ? resolveRevenueDetail(line) : resolveExpenseDetail(line),
    }));

export class LedgerRecordMapper {
  mapInvoices(records: readonly unknown[]): LedgerDocument[] {
    return records.map((raw): LedgerDocument => {
      const record = parseRecord(InvoiceRecordSchema, 'Invoice', raw);

      return {
        kind: 'invoice',
        id: record.Id,
        counterparty: record.CustomerRef?.name ?? null,
        txnDate: record.TxnDate ?? null,
        totalAmount: roundAmount(record.TotalAmt),
        balance: coerceAmount(record.Balance),
        lines: mapLines(record.Line, 'invoice'),
      };
    });
  }

  mapBills(records: readonly unknown[]): LedgerDocument[] {
    return records.map((raw): LedgerDocument => {
      const record = parseRecord(BillRecordSchema, 'Bill', raw);

      return {
        kind: 'bill',
        id: record.Id,
        counterparty: record.VendorRef?.name ?? null,
        txnDate: record.TxnDate ?? null,
        totalAmount: roundAmount(record.TotalAmt),
        balance: coerceAmount(record.Balance),
        lines: mapLines(record.Line, 'bill'),
      };
    });
  }

  mapAccounts(records: readonly unknown[]): Account[] {
    return records.map((raw): Account => {
      const record = parseRecord(AccountRecordSchema, 'Account', raw);

      return {
        id: record.Id,
        name: record.Name ?? 'Unknown Account',
        currentBalance: roundAmount(record.CurrentBalance),
        accountType: record.AccountType ?? null,
        accountSubType: record.AccountSubType,
        active: record.Active,
      };
    });
  }
}
