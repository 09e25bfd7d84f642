import { describeError } from '../../errors.js';
import { logger } from '../../logger.js';
import type { ExtractedAttributes, ServiceType } from '../../types.js';
import { combineText, mergeAttributes, type AttributeExtractor } from './common.js';
import { extractElectricity } from './electricity.js';
import { extractGas } from './gas.js';
import { GENERIC_EXTRACTORS } from './generic.js';
import { extractWater } from './water.js';

export { mergeAttributes } from './common.js';

const TYPE_EXTRACTORS: Partial<Record<ServiceType, AttributeExtractor>> = {
  water: extractWater,
  gas: extractGas,
  electricity: extractElectricity,
};

/**
 * Generic baseline fields, then the extractor for `serviceType` merged over
 * them. Never throws: a failing step leaves the fields collected so far and
 * records the failure under the internal `_extraction_error` key.
 */
export function extractAttributes(subject: string, body: string, serviceType: ServiceType): ExtractedAttributes {
  const input = { subject, text: combineText(subject, body) };
  const typeExtractor = TYPE_EXTRACTORS[serviceType];
  const steps = typeExtractor ? [...GENERIC_EXTRACTORS, typeExtractor] : GENERIC_EXTRACTORS;

  let attributes: ExtractedAttributes = {};
  try {
    for (const step of steps) {
      attributes = mergeAttributes(attributes, step(input));
    }
  } catch (error) {
    logger.debug({ err: error, serviceType }, 'Attribute extraction stopped early');
    attributes = { ...attributes, _extraction_error: describeError(error) };
  }
  return attributes;
}
