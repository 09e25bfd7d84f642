import type { ServiceRecord } from '../../types.js';
import { escapeRegExp } from '../../utils/text.js';
import { SENDER_DOMAIN } from '../patterns/index.js';

export interface CandidateMessage {
  from: string;
  subject: string;
  body: string;
}

export type MatchCriterion = 'sender_domain' | 'name_words' | 'service_id';

type ServiceKey = Pick<ServiceRecord, 'serviceId' | 'serviceName' | 'sampleFrom'>;

function senderDomainMatches(service: ServiceKey, from: string): boolean {
  const domain = SENDER_DOMAIN.exec(service.sampleFrom)?.[1];
  return domain !== undefined && from.toLowerCase().includes(domain.toLowerCase());
}

/** Names without a word longer than three characters never match here. */
function nameWordsMatch(service: ServiceKey, combined: string): boolean {
  const words = service.serviceName
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 3);
  return words.length > 0 && words.every((word) => combined.includes(word));
}

function serviceIdMatches(service: ServiceKey, combined: string): boolean {
  const pattern = service.serviceId.split('_').map(escapeRegExp).join('.*');
  return pattern.length > 0 && new RegExp(pattern, 'i').test(combined);
}

/**
 * First criterion that attributes `message` to `service`, or null. Any one
 * criterion is enough, so sender or subject drift between cycles still matches.
 */
export function matchService(service: ServiceKey, message: CandidateMessage): MatchCriterion | null {
  if (senderDomainMatches(service, message.from)) {
    return 'sender_domain';
  }
  const combined = `${message.from} ${message.subject} ${message.body}`.toLowerCase();
  if (nameWordsMatch(service, combined)) {
    return 'name_words';
  }
  if (serviceIdMatches(service, combined)) {
    return 'service_id';
  }
  return null;
}
