const DMY = String.raw`\d{1,2}[/-]\d{1,2}[/-]\d{4}`;

export const KWH_CONSUMPTION = /(?<![\d.,])(\d+(?:[.,]\d+)*)\s*kwh(?![a-z])/i;

export const CONTRACTED_POWER_LABEL = /potencia\s+contratada/i;

export const KW_POWER = /(\d+(?:[.,]\d+)?)\s*kw(?!h)(?![a-z])/i;

/** "N° Boleta 123456 del 05-02-2026": invoice number and issue date. */
export const BOLETA_PHRASE = new RegExp(String.raw`N[°º]\s*Boleta\s+(\d{6,})\s+del\s+(${DMY})`, 'i');

export const SUPPLY_ADDRESS_PHRASE = /ubicad[oa]\s+en\s+([\s\S]{5,160}?)\s*,?\s+ya\s+est[áa]\s+disponible/i;

export const NEXT_PERIOD_PHRASE = new RegExp(
  String.raw`pr[óo]ximo\s+per[ií]odo\s+de\s+facturaci[óo]n[:\s]*(?:del\s+)?(${DMY})\s*(?:-|al|a)\s*(${DMY})`,
  'i',
);

export const CONSUMPTION_QUALITY = /\b(?:consumo|lectura)\s+(?:fue\s+|es\s+)?(real|estimad[oa])\b/i;
