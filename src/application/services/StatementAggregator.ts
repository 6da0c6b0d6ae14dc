import { Account, BalanceSheetSection } from '../../domain/entities/Account.js';
import { DocumentSummary, LedgerDocument } from '../../domain/entities/LedgerDocument.js';
import {
  BalanceSheet,
  CashFlowStatement,
  CategorizedProfitAndLoss,
  CategoryAmounts,
  ClassificationFallback,
  FlatProfitAndLoss,
  SectionTotalKey,
  StatementRow,
} from '../../domain/entities/Statement.js';
import { classifyAccount } from '../../domain/services/AccountClassifier.js';
import { fromCents, subtractAmounts, sumAmounts, toCents } from '../../domain/services/Money.js';
import { CategorizerPort, LineKind } from '../ports/CategorizerPort.js';

export interface CashFlowInput {
  netIncome: number;
  operating?: CategoryAmounts;
  investing?: CategoryAmounts;
  financing?: CategoryAmounts;
  beginningCash?: number;
}

const sectionOrder: BalanceSheetSection[] = ['Asset', 'Liability', 'Equity', 'Unclassified'];

const sectionTotalKey: Record<BalanceSheetSection, SectionTotalKey> = {
  Asset: 'Assets',
  Liability: 'Liabilities',
  Equity: 'Equity',
  Unclassified: 'Unclassified',
};

interface SubgroupBucket {
  section: BalanceSheetSection;
  subgroup: string;
  accounts: Account[];
}

export class StatementAggregator {
  constructor(private readonly categorizer: CategorizerPort) {}

  buildProfitAndLoss(invoices: readonly LedgerDocument[], bills: readonly LedgerDocument[]): CategorizedProfitAndLoss {
    const fallbacks: ClassificationFallback[] = [];
    const revenueDetail = this.groupLines(invoices, 'revenue', fallbacks);
    const expenseDetail = this.groupLines(bills, 'expense', fallbacks);

    const totalRevenue = sumAmounts(Object.values(revenueDetail));
    const totalExpenses = sumAmounts(Object.values(expenseDetail));
    const netIncome = subtractAmounts(totalRevenue, totalExpenses);

    if (fallbacks.length > 0) {
      console.warn(`⚠️ ${fallbacks.length} line(s) fell back to a default category`);
    }

    return {
      shape: 'categorized',
      revenueDetail,
      expenseDetail,
      totalRevenue,
      totalExpenses,
      grossProfit: netIncome,
      netIncome,
      fallbacks,
    };
  }

  /** Top-line figures only, for callers that hold document totals rather than line detail. */
  buildFlatProfitAndLoss(
    invoices: readonly Pick<DocumentSummary, 'totalAmount'>[],
    bills: readonly Pick<DocumentSummary, 'totalAmount'>[],
  ): FlatProfitAndLoss {
    const totalRevenue = sumAmounts(invoices.map((invoice) => invoice.totalAmount));
    const totalExpenses = sumAmounts(bills.map((bill) => bill.totalAmount));

    return {
      shape: 'flat',
      totalRevenue,
      totalExpenses,
      netIncome: subtractAmounts(totalRevenue, totalExpenses),
    };
  }

  buildBalanceSheet(accounts: readonly Account[]): BalanceSheet {
    const buckets = new Map<string, SubgroupBucket>();
    const fallbacks: ClassificationFallback[] = [];

    for (const account of accounts) {
      const { section, subgroup } = classifyAccount(account.accountType);

      if (section === 'Unclassified') {
        fallbacks.push({
          subject: 'account',
          reference: account.name,
          reason: 'unknown-account-type',
          appliedLabel: subgroup,
        });
      }

      const key = `${section}\u0000${subgroup}`;
      const bucket = buckets.get(key) ?? { section, subgroup, accounts: [] };
      bucket.accounts.push(account);
      buckets.set(key, bucket);
    }

    const ordered = Array.from(buckets.values()).sort(
      (a, b) => sectionOrder.indexOf(a.section) - sectionOrder.indexOf(b.section),
    );

    const rows: StatementRow[] = [];
    const sectionCents = new Map<BalanceSheetSection, number>([
      ['Asset', 0],
      ['Liability', 0],
      ['Equity', 0],
    ]);

    for (const bucket of ordered) {
      rows.push({ kind: 'section-header', label: bucket.subgroup, amount: null });

      let subtotalCents = 0;
      for (const account of bucket.accounts) {
        const cents = toCents(account.currentBalance);
        subtotalCents += cents;
        rows.push({ kind: 'detail', label: `  ${account.name}`, amount: fromCents(cents) });
      }

      rows.push({ kind: 'subtotal', label: `Total ${bucket.subgroup}`, amount: fromCents(subtotalCents) });
      rows.push({ kind: 'spacer', label: '', amount: null });

      sectionCents.set(bucket.section, (sectionCents.get(bucket.section) ?? 0) + subtotalCents);
    }

    const sectionTotals: BalanceSheet['sectionTotals'] = { Assets: 0, Liabilities: 0, Equity: 0 };

    for (const section of sectionOrder) {
      const cents = sectionCents.get(section);
      if (cents === undefined) {
        continue;
      }

      const key = sectionTotalKey[section];
      sectionTotals[key] = fromCents(cents);
      rows.push({ kind: 'total', label: `Total ${key}`, amount: fromCents(cents) });
    }

    if (fallbacks.length > 0) {
      console.warn(`⚠️ ${fallbacks.length} account(s) could not be classified and were reported as Unclassified`);
    }

    return { rows, sectionTotals, fallbacks };
  }

  /** Indirect method. Category membership of each delta is decided by the caller. */
  buildCashFlow(input: CashFlowInput): CashFlowStatement {
    const operating = { ...input.operating };
    const investing = { ...input.investing };
    const financing = { ...input.financing };

    const netOperating = sumAmounts(Object.values(operating));
    const netInvesting = sumAmounts(Object.values(investing));
    const netFinancing = sumAmounts(Object.values(financing));
    const netChangeInCash = sumAmounts([netOperating, netInvesting, netFinancing]);
    const beginningCash = input.beginningCash ?? 0;

    return {
      netIncome: input.netIncome,
      operating,
      investing,
      financing,
      netOperating,
      netInvesting,
      netFinancing,
      netChangeInCash,
      beginningCash,
      endingCash: sumAmounts([beginningCash, netChangeInCash]),
    };
  }

  summarizeDocuments(documents: readonly LedgerDocument[]): DocumentSummary[] {
    return documents.map((document) => ({
      id: document.id,
      counterparty: document.counterparty,
      txnDate: document.txnDate,
      totalAmount: document.totalAmount,
      balance: document.balance,
    }));
  }

  private groupLines(
    documents: readonly LedgerDocument[],
    lineKind: LineKind,
    fallbacks: ClassificationFallback[],
  ): CategoryAmounts {
    const centsByCategory = new Map<string, number>();

    for (const document of documents) {
      for (const line of document.lines) {
        const { category, amount, fallback } = this.categorizer.categorize(line, lineKind);
        centsByCategory.set(category, (centsByCategory.get(category) ?? 0) + toCents(amount));

        if (fallback) {
          fallbacks.push(fallback);
        }
      }
    }

    return Object.fromEntries(Array.from(centsByCategory, ([category, cents]): [string, number] => [category, fromCents(cents)]));
  }
}
