export const GAS_CONSUMPTION_LABEL = /consumo(?:\s+(?:de\s+gas|del\s+per[ií]odo|total))?/i;

export const METROPUNTOS = /metropuntos[:\s]*(?:acumulados[:\s]*)?(\d{1,3}(?:[.,]\d{3})+|\d+)/i;
