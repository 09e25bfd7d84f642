import type { ServiceType } from '../../types.js';

export interface ProviderPattern {
  pattern: RegExp;
  name: string;
  type: ServiceType;
}

/** Known senders, most specific first. The trailing entries are generic fallbacks. */
export const PROVIDER_PATTERNS: readonly ProviderPattern[] = [
  { pattern: /aguas?\s*andinas?/i, name: 'Aguas Andinas', type: 'water' },
  { pattern: /essbio|esval|nuevo\s+sur/i, name: 'Agua', type: 'water' },
  { pattern: /\benel\b|chilectra|cge\s+distribuci[oó]n/i, name: 'Electricidad', type: 'electricity' },
  { pattern: /\bmetrogas\b|lipigas|gasco/i, name: 'Gas', type: 'gas' },
  { pattern: /\b(?:movistar|entel|claro|wom|vtr)\b/i, name: 'Telecomunicaciones', type: 'telecom' },
  { pattern: /mundo.*pac[íi]fico|\bgtd\b|telef[oó]nica/i, name: 'Internet/TV', type: 'telecom' },
  { pattern: /compa[ñn][íi]a\s+de\s+agua/i, name: 'Agua', type: 'water' },
  { pattern: /compa[ñn][íi]a\s+de\s+electricidad/i, name: 'Electricidad', type: 'electricity' },
  { pattern: /compa[ñn][íi]a\s+de\s+gas/i, name: 'Gas', type: 'gas' },
];

/** Invoice, payment and due-date vocabulary that marks a message as a bill. */
export const BILLING_INDICATORS: readonly RegExp[] = [
  /factura|boleta|cuenta|cuota|pago|cobro|consumo/i,
  /invoice|bill|payment|statement/i,
  /folio|número de cuenta|nº de cliente/i,
  /vencimiento|fecha de pago|total a pagar|monto/i,
  /due date|amount due|total due/i,
  /dte|documento tributario|electr[oó]nica/i,
];

export const SENDER_DOMAIN = /@([a-zA-Z0-9-]+)\.[a-zA-Z]+/;

export const DOMAIN_PREFIX = /^(?:admin|noreply|info|facturacion|dte|no-reply)/i;

export const DOMAIN_SUFFIX = /(?:admin|cl)$/i;

/** Uppercase company name ending in "S.A." in a subject line. */
export const COMPANY_SUBJECT = /(?<![\p{L}\d])[A-ZÁÉÍÓÚÑ]{2,}(?:\s+[A-ZÁÉÍÓÚÑ]{2,}){0,3}\s+S\.?A\.?/u;

export const COMPANY_SUFFIX = /\s+S\.?A\.?$/u;
