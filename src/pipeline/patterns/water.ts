export const M3_CONSUMPTION = /(?<![\d.,])(\d+(?:[.,]\d+)?)\s*m(?:3|³)(?![\p{L}\d])/iu;

export const METER_READING = /lectura\s+(?:anterior|actual|(?:del\s+)?medidor)[:\s]*(\d+(?:[.,]\d+)?)/i;

export const METER_NUMBER = /(?:n[úu]mero|n[°º]|nro\.?)\s*(?:de\s+|del\s+)?medidor[:\s]*([A-Z0-9][A-Z0-9-]{2,19})/i;

/**
 * Aguas Andinas prints address and account number in one block, separated
 * by two or more spaces: `AV SIEMPRE VIVA 742    12345-6`. Case-sensitive.
 * The address holds single spaces only, so a label set off by a wider gap
 * stays out of it.
 */
export const PACKED_ADDRESS_ACCOUNT =
  /([A-ZÁÉÍÓÚÑ0-9](?:[A-ZÁÉÍÓÚÑ0-9.,#°º'/-]| (?! ))*?[A-ZÁÉÍÓÚÑ0-9.])[ \t]{2,}(\d{5,}-\d)(?!\d)/;
