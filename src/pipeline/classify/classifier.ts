import type { ServiceType } from '../../types.js';
import { PROVIDER_PATTERNS, type ProviderPattern } from '../patterns/index.js';

/** First provider entry matching `text`; order of `PROVIDER_PATTERNS` decides overlaps. */
export function findProvider(text: string): ProviderPattern | null {
  return PROVIDER_PATTERNS.find((provider) => provider.pattern.test(text)) ?? null;
}

export function classifyService(from: string, subject: string): ServiceType {
  return findProvider(`${from} ${subject}`)?.type ?? 'unknown';
}
