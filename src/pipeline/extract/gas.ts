import type { AttributePatch } from '../../types.js';
import { GAS_CONSUMPTION_LABEL, M3_CONSUMPTION, METROPUNTOS, PLAIN_AMOUNT, TOTAL_LABELS } from '../patterns/index.js';
import { findAfterLabels, firstMatch, type AttributeExtractor } from './common.js';

const LABEL_WINDOW = 60;

/** Metrogas bills print the total without a currency symbol. */
export const extractGas: AttributeExtractor = ({ text }) => {
  const out: AttributePatch = {};

  const total = findAfterLabels(TOTAL_LABELS, text, LABEL_WINDOW, [PLAIN_AMOUNT]);
  if (total !== null) {
    out.total_amount = total;
  }

  // label-anchored only: the bare unit shows up in marketing copy
  const consumption = findAfterLabels([GAS_CONSUMPTION_LABEL], text, LABEL_WINDOW, [M3_CONSUMPTION]);
  if (consumption !== null) {
    out.consumption_m3 = consumption;
  }

  const points = firstMatch([METROPUNTOS], text);
  if (points !== null) {
    out.metropuntos = points;
  }

  return out;
};
