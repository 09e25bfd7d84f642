import type { AttributePatch } from '../../types.js';
import {
  ADDRESS_LABELS,
  CURRENCY_PATTERNS,
  CUSTOMER_LABELS,
  CUSTOMER_NUMBER,
  DATE_PATTERNS,
  DUE_DATE_LABELS,
  FOLIO_PATTERNS,
  TOTAL_LABELS,
} from '../patterns/index.js';
import {
  allMatches,
  collapseWhitespace,
  findAfterLabels,
  firstMatch,
  labelWindows,
  type AttributeExtractor,
} from './common.js';

const AMOUNT_WINDOW = 60;
const CUSTOMER_WINDOW = 80;
const ADDRESS_WINDOW = 300;
const DUE_DATE_WINDOW = 60;

function field(name: string, value: string | null): AttributePatch {
  return value === null ? {} : { [name]: value };
}

export const extractFolio: AttributeExtractor = ({ subject }) => field('folio', firstMatch(FOLIO_PATTERNS, subject));

export const extractTotalAmount: AttributeExtractor = ({ text }) =>
  field(
    'total_amount',
    findAfterLabels(TOTAL_LABELS, text, AMOUNT_WINDOW, CURRENCY_PATTERNS) ?? firstMatch(CURRENCY_PATTERNS, text),
  );

export const extractCustomerNumber: AttributeExtractor = ({ text }) => {
  const found = findAfterLabels(CUSTOMER_LABELS, text, CUSTOMER_WINDOW, [CUSTOMER_NUMBER]);
  // a sentence period or dangling dash is not part of the number
  return field('customer_number', found === null ? null : found.replace(/[.-]+$/, ''));
};

export const extractAddress: AttributeExtractor = ({ text }): AttributePatch => {
  for (const window of labelWindows(ADDRESS_LABELS, text, ADDRESS_WINDOW)) {
    const [line = ''] = window.replace(/^[\s:.-]+/, '').split(/\r?\n/);
    const address = collapseWhitespace(line);
    if (address.length >= 5 && address.length <= 120) {
      return { address };
    }
  }
  return {};
};

export const extractDueDate: AttributeExtractor = ({ text }) =>
  field('due_date', findAfterLabels(DUE_DATE_LABELS, text, DUE_DATE_WINDOW, DATE_PATTERNS));

/**
 * First two distinct dates, pattern order first, then position. Layouts where
 * these are not the billing period correct it in their own extractor.
 */
export const extractBillingPeriod: AttributeExtractor = ({ text }) => {
  const dates: string[] = [];
  for (const pattern of DATE_PATTERNS) {
    for (const date of allMatches(pattern, text)) {
      if (!dates.includes(date)) {
        dates.push(date);
      }
      if (dates.length === 2) {
        return { billing_period_start: dates[0], billing_period_end: dates[1] };
      }
    }
  }
  return field('billing_period_start', dates[0] ?? null);
};

/** Baseline fields, in extraction order. */
export const GENERIC_EXTRACTORS: readonly AttributeExtractor[] = [
  extractFolio,
  extractBillingPeriod,
  extractTotalAmount,
  extractCustomerNumber,
  extractAddress,
  extractDueDate,
];
