import type { AttributePatch } from '../../types.js';
import { M3_CONSUMPTION, METER_NUMBER, METER_READING, PACKED_ADDRESS_ACCOUNT } from '../patterns/index.js';
import { allMatches, collapseWhitespace, firstMatch, type AttributeExtractor } from './common.js';

export const extractWater: AttributeExtractor = ({ text }) => {
  const out: AttributePatch = {};

  const consumption = firstMatch([M3_CONSUMPTION], text);
  if (consumption !== null) {
    out.consumption_m3 = consumption;
  }

  const readings = allMatches(METER_READING, text);
  if (readings.length === 1) {
    out.meter_reading = readings[0];
  } else if (readings.length > 1) {
    out.meter_reading = readings;
  }

  const meter = firstMatch([METER_NUMBER], text);
  if (meter !== null) {
    out.meter_number = meter;
  }

  const packed = PACKED_ADDRESS_ACCOUNT.exec(text);
  if (packed) {
    out.address = collapseWhitespace(packed[1]);
    out.customer_number = packed[2];
  }

  return out;
};
