import { describeError, isMailboxError } from '../../errors.js';
import { logger } from '../../logger.js';
import type { DetectedService, ServiceType } from '../../types.js';
import { capitalize, slugify, titleCase } from '../../utils/text.js';
import type { MailboxSession } from '../../connectors/types.js';
import { findProvider } from '../classify/classifier.js';
import { parseMessage } from '../normalize/index.js';
import {
  BILLING_INDICATORS,
  COMPANY_SUBJECT,
  COMPANY_SUFFIX,
  DOMAIN_PREFIX,
  DOMAIN_SUFFIX,
  SENDER_DOMAIN,
} from '../patterns/index.js';

export const DETECTION_BODY_LIMIT = 5000;

export interface ServiceIdentity {
  serviceName: string;
  serviceId: string;
  serviceType: ServiceType;
}

export function isBillingText(text: string): boolean {
  return BILLING_INDICATORS.some((pattern) => pattern.test(text));
}

function identityFromDomain(from: string): ServiceIdentity | null {
  const match = SENDER_DOMAIN.exec(from);
  if (!match) {
    return null;
  }
  const domain = match[1].replace(DOMAIN_PREFIX, '').replace(DOMAIN_SUFFIX, '').replace(/^[-_]+|[-_]+$/g, '');
  if (domain.length <= 3) {
    return null;
  }
  return {
    serviceName: domain.split(/[-_]/).filter(Boolean).map(capitalize).join(' '),
    serviceId: slugify(domain),
    serviceType: 'unknown',
  };
}

function identityFromSubject(subject: string): ServiceIdentity | null {
  const match = COMPANY_SUBJECT.exec(subject);
  if (!match) {
    return null;
  }
  const company = match[0].replace(COMPANY_SUFFIX, '').trim();
  return { serviceName: titleCase(company), serviceId: slugify(company), serviceType: 'unknown' };
}

/**
 * Resolves who sent a billing message: known provider, then sender domain,
 * then an "ACME S.A." company name in the subject.
 */
export function identifyService(from: string, subject: string, body: string): ServiceIdentity | null {
  const provider = findProvider(`${from} ${subject} ${body}`);
  if (provider) {
    return { serviceName: provider.name, serviceId: slugify(provider.name), serviceType: provider.type };
  }
  return identityFromDomain(from) ?? identityFromSubject(subject);
}

/**
 * Scans the newest `scanLimit` messages of `mailbox` and groups billing
 * messages by service id. Broken messages are skipped; mailbox errors
 * propagate.
 */
export async function detectServices(
  session: MailboxSession,
  mailbox: string,
  scanLimit: number,
): Promise<DetectedService[]> {
  const ids = (await session.listMessageIds(mailbox)).slice(-scanLimit);
  const found = new Map<string, DetectedService>();

  for (const id of ids) {
    try {
      const message = await parseMessage(await session.fetchRaw(id));
      if (!message.hasAttachment) {
        continue;
      }

      const body = message.body.slice(0, DETECTION_BODY_LIMIT);
      if (!isBillingText(`${message.from} ${message.subject} ${body}`)) {
        continue;
      }

      const identity = identifyService(message.from, message.subject, body);
      if (!identity) {
        continue;
      }

      const existing = found.get(identity.serviceId);
      if (existing) {
        existing.emailCount += 1;
      } else {
        found.set(identity.serviceId, {
          ...identity,
          sampleSubject: message.subject,
          sampleFrom: message.from,
          emailCount: 1,
        });
      }
    } catch (error) {
      if (isMailboxError(error)) {
        throw error;
      }
      logger.debug({ messageId: id, err: describeError(error) }, 'Skipping message during detection');
    }
  }

  logger.info({ mailbox, scanned: ids.length, services: found.size }, 'Service detection finished');
  return [...found.values()];
}
