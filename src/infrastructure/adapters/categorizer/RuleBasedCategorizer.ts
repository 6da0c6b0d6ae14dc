import { CategorizerPort, LineCategorization, LineKind } from '../../../application/ports/CategorizerPort.js';
import { EntityRef, LineDetail, TransactionLine } from '../../../domain/entities/LedgerDocument.js';
import { ClassificationFallback } from '../../../domain/entities/Statement.js';
import { roundAmount } from '../../../domain/services/Money.js';

export const DEFAULT_REVENUE_CATEGORY = 'Other Revenue';
export const DEFAULT_EXPENSE_CATEGORY = 'Other Expenses';

const defaultCategory: Record<LineKind, string> = {
  revenue: DEFAULT_REVENUE_CATEGORY,
  expense: DEFAULT_EXPENSE_CATEGORY,
};

type RuleOutcome = { label: string } | { declined: ClassificationFallback['reason'] } | null;

interface Rule {
  lineKind: LineKind;
  detailKind: LineDetail['kind'];
}

// Evaluated in order; the first rule that yields a label wins.
const rules: Rule[] = [
  // Revenue
  { lineKind: 'revenue', detailKind: 'sales' },

  // Expenses: account-based detail takes priority over item-based detail
  { lineKind: 'expense', detailKind: 'account-expense' },
  { lineKind: 'expense', detailKind: 'item-expense' },
];

const referenceOf = (detail: LineDetail): EntityRef | null => {
  switch (detail.kind) {
    case 'sales':
    case 'item-expense':
      return detail.itemRef;
    case 'account-expense':
      return detail.accountRef;
    case 'none':
      return null;
  }
};

const applyRule = (rule: Rule, detail: LineDetail, lineKind: LineKind): RuleOutcome => {
  if (rule.lineKind !== lineKind || rule.detailKind !== detail.kind) {
    return null;
  }

  const name = referenceOf(detail)?.name?.trim();
  return name ? { label: name } : { declined: 'unnamed-reference' };
};

export class RuleBasedCategorizer implements CategorizerPort {
  categorize(line: TransactionLine, lineKind: LineKind): LineCategorization {
    const amount = roundAmount(line.amount);
    let reason: ClassificationFallback['reason'] = line.detail.kind === 'none' ? 'no-detail' : 'detail-mismatch';

    for (const rule of rules) {
      const outcome = applyRule(rule, line.detail, lineKind);

      if (!outcome) {
        continue;
      }

      if ('label' in outcome) {
        return { category: outcome.label, amount, fallback: null };
      }

      reason = outcome.declined;
    }

    const category = defaultCategory[lineKind];

    return {
      category,
      amount,
      fallback: {
        subject: 'line',
        reference: line.id ?? line.description ?? '(unidentified line)',
        reason,
        appliedLabel: category,
      },
    };
  }
}
