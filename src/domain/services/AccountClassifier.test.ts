import { classifyAccount, formatSubgroupLabel } from './AccountClassifier.js';

describe('classifyAccount', () => {
  test.each([
    ['Bank', 'Asset', 'Bank'],
    ['Accounts Receivable', 'Asset', 'Accounts Receivable'],
    ['Other Current Asset', 'Asset', 'Other Current Asset'],
    ['Fixed Asset', 'Asset', 'Fixed Asset'],
    ['Accounts Payable', 'Liability', 'Accounts Payable'],
    ['Credit Card', 'Liability', 'Credit Card'],
    ['Other Current Liability', 'Liability', 'Other Current Liability'],
    ['Long Term Liability', 'Liability', 'Long Term Liability'],
    ['Equity', 'Equity', 'Equity'],
  ])('maps %s to %s', (tag, section, subgroup) => {
    expect(classifyAccount(tag)).toEqual({ section, subgroup });
  });

  test('ignores case and separators in the type tag', () => {
    expect(classifyAccount('accounts_receivable')).toEqual({ section: 'Asset', subgroup: 'Accounts Receivable' });
    expect(classifyAccount('LongTermLiability')).toEqual({ section: 'Liability', subgroup: 'Long Term Liability' });
    expect(classifyAccount('credit-card')).toEqual({ section: 'Liability', subgroup: 'Credit Card' });
  });

  test('falls back to Unclassified for unknown or missing tags', () => {
    expect(classifyAccount('Income')).toEqual({ section: 'Unclassified', subgroup: 'Income' });
    expect(classifyAccount('constructor')).toEqual({ section: 'Unclassified', subgroup: 'Constructor' });
    expect(classifyAccount(null)).toEqual({ section: 'Unclassified', subgroup: 'Uncategorized' });
    expect(classifyAccount('   ')).toEqual({ section: 'Unclassified', subgroup: 'Uncategorized' });
  });
});

describe('formatSubgroupLabel', () => {
  test('renders raw tags as title-cased words', () => {
    expect(formatSubgroupLabel('other_current_asset')).toBe('Other Current Asset');
    expect(formatSubgroupLabel('OtherCurrentAsset')).toBe('Other Current Asset');
    expect(formatSubgroupLabel('Bank')).toBe('Bank');
  });
});
