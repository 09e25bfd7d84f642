/**
 * Shared billing vocabulary. Every table here is ordered: earlier entries
 * are more specific and win over later ones.
 */

/** Thousands-separated amount with optional decimals, or a plain number. */
export const AMOUNT = String.raw`\d{1,3}(?:[.,]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?`;

/** Amounts carrying a currency marker, `$` prefix first. */
export const CURRENCY_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\$\s*(${AMOUNT})`),
  new RegExp(String.raw`(?<![\d.,])(${AMOUNT})\s*(?:CLP|USD|EUR|pesos?)(?![a-z])`, 'i'),
];

/** Amount with no currency marker; only used inside a labelled window. */
export const PLAIN_AMOUNT = new RegExp(String.raw`(?<![\d.,/-])(${AMOUNT})(?![\d/-])`);

const MONTHS_EN =
  'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

/** DD/MM/YYYY, "D de MMMM de YYYY", "Month D, YYYY". */
export const DATE_PATTERNS: readonly RegExp[] = [
  /(?<!\d)(\d{1,2}[/-]\d{1,2}[/-](?:\d{4}|\d{2}))(?!\d)/,
  /(\d{1,2}\s+de\s+[a-záéíóúñ]+\s+de\s+\d{4})/i,
  new RegExp(String.raw`\b((?:${MONTHS_EN})\.?\s+\d{1,2},?\s+\d{4})\b`, 'i'),
];

/** Subject-only invoice number patterns; at least six digits. */
export const FOLIO_PATTERNS: readonly RegExp[] = [
  /folio[:\s]*(\d{6,})/i,
  /\bnro\.?[:\s]*(\d{6,})/i,
  /n[úu]mero[:\s]*(\d{6,})/i,
  /boleta[:\s]*(\d{6,})/i,
  /factura[:\s]*(\d{6,})/i,
];

export const TOTAL_LABELS: readonly RegExp[] = [
  /total\s+a\s+pagar/i,
  /monto\s+(?:total|a\s+pagar)/i,
  /importe\s+total/i,
  /(?:total|amount)\s+due/i,
  /\btotal\b/i,
];

export const CUSTOMER_LABELS: readonly RegExp[] = [
  /n[úu]mero\s+de\s+(?:cliente|cuenta)/i,
  /\bn(?:[°º]|ro\.?)\s*(?:de\s+)?(?:cliente|cuenta)/i,
  /c[óo]digo\s+de\s+cliente/i,
  /cuenta\s+contrato/i,
  /(?:customer|account)\s+(?:number|no\.?|id)/i,
];

/** Digits, dots and dashes following a customer label. */
export const CUSTOMER_NUMBER = /\d[\d.-]{0,19}/;

export const ADDRESS_LABELS: readonly RegExp[] = [
  /direcci[óo]n(?:\s+de\s+(?:suministro|servicio))?/i,
  /domicilio/i,
  /(?:service\s+)?address/i,
];

export const DUE_DATE_LABELS: readonly RegExp[] = [/fecha\s+de\s+vencimiento/i, /due\s+date/i];

export const CONSUMPTION_LABEL = /\bconsumo\b/i;
