import { AccountClassification, BalanceSheetSection } from '../entities/Account.js';

const sectionByType: Record<string, BalanceSheetSection> = {
  bank: 'Asset',
  accountsreceivable: 'Asset',
  othercurrentasset: 'Asset',
  fixedasset: 'Asset',
  otherasset: 'Asset',
  accountspayable: 'Liability',
  creditcard: 'Liability',
  othercurrentliability: 'Liability',
  longtermliability: 'Liability',
  equity: 'Equity',
};

export const UNCATEGORIZED_SUBGROUP = 'Uncategorized';

const normalizeTypeTag = (tag: string): string => tag.replace(/[^a-z0-9]/gi, '').toLowerCase();

/** "accounts_receivable" / "OtherCurrentAsset" / "credit-card" -> "Accounts Receivable" / "Other Current Asset" / "Credit Card" */
export const formatSubgroupLabel = (tag: string): string => {
  const words = tag
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);

  return words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join(' ');
};

export const classifyAccount = (accountType: string | null | undefined): AccountClassification => {
  const tag = accountType?.trim() ?? '';

  if (tag.length === 0) {
    return { section: 'Unclassified', subgroup: UNCATEGORIZED_SUBGROUP };
  }

  const normalized = normalizeTypeTag(tag);
  const section = Object.hasOwn(sectionByType, normalized) ? sectionByType[normalized] : 'Unclassified';

  return { section, subgroup: formatSubgroupLabel(tag) || UNCATEGORIZED_SUBGROUP };
};
