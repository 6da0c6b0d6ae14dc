import { TransactionLine } from '../../domain/entities/LedgerDocument.js';
import { ClassificationFallback } from '../../domain/entities/Statement.js';

export type LineKind = 'revenue' | 'expense';

export interface LineCategorization {
  category: string;
  amount: number;
  fallback: ClassificationFallback | null;
}

export interface CategorizerPort {
  categorize(line: TransactionLine, lineKind: LineKind): LineCategorization;
}
