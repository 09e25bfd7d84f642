import type { AttributePatch } from '../../types.js';
import {
  BOLETA_PHRASE,
  CONSUMPTION_LABEL,
  CONSUMPTION_QUALITY,
  CONTRACTED_POWER_LABEL,
  KWH_CONSUMPTION,
  KW_POWER,
  NEXT_PERIOD_PHRASE,
  SUPPLY_ADDRESS_PHRASE,
} from '../patterns/index.js';
import { collapseWhitespace, findAfterLabels, firstMatch, type AttributeExtractor } from './common.js';

const LABEL_WINDOW = 60;

export const extractElectricity: AttributeExtractor = ({ text }) => {
  const out: AttributePatch = {};

  const consumption =
    findAfterLabels([CONSUMPTION_LABEL], text, LABEL_WINDOW, [KWH_CONSUMPTION]) ?? firstMatch([KWH_CONSUMPTION], text);
  if (consumption !== null) {
    out.consumption_kwh = consumption;
  }

  const power = findAfterLabels([CONTRACTED_POWER_LABEL], text, LABEL_WINDOW, [KW_POWER]);
  if (power !== null) {
    out.contracted_power_kw = power;
  }

  const boleta = BOLETA_PHRASE.exec(text);
  if (boleta) {
    out.folio = boleta[1];
    out.issue_date = boleta[2];
  }

  const address = SUPPLY_ADDRESS_PHRASE.exec(text);
  if (address) {
    out.address = collapseWhitespace(address[1]);
  }

  const nextPeriod = NEXT_PERIOD_PHRASE.exec(text);
  if (nextPeriod) {
    out.next_billing_period_start = nextPeriod[1];
    out.next_billing_period_end = nextPeriod[2];
    // the date scan picked up the boleta and due dates instead
    out.billing_period_start = null;
    out.billing_period_end = null;
  }

  const quality = CONSUMPTION_QUALITY.exec(text);
  if (quality) {
    out.consumption_type = quality[1].toLowerCase() === 'real' ? 'real' : 'estimado';
  }

  return out;
};
