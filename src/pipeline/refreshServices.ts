import { describeError, isMailboxError } from '../errors.js';
import { logger } from '../logger.js';
import type { MailboxSession, MailboxTransport } from '../connectors/types.js';
import type { MailboxSettings, NormalizedMessage, RefreshResult, ServiceRecord, ServiceType } from '../types.js';
import { classifyService } from './classify/classifier.js';
import { extractAttributes } from './extract/index.js';
import { matchService } from './match/matcher.js';
import { parseMessage } from './normalize/index.js';

export interface RefreshOptions {
  scanLimit: number;
}

export function resolveServiceType(service: ServiceRecord): ServiceType {
  return service.serviceType === 'unknown'
    ? classifyService(service.sampleFrom, service.sampleSubject)
    : service.serviceType;
}

/**
 * Finds the newest matching message for each configured service and
 * extracts its attributes. One session serves the whole cycle; mailbox
 * errors abort it and reach the caller.
 */
export class ServiceRefreshService {
  constructor(
    private readonly transport: MailboxTransport,
    private readonly options: RefreshOptions,
  ) {}

  async refresh(settings: MailboxSettings, services: ServiceRecord[]): Promise<Record<string, RefreshResult>> {
    const session = await this.transport.open(settings);
    try {
      return await this.refreshWithSession(session, settings.mailbox, services);
    } finally {
      await session.close();
    }
  }

  private async refreshWithSession(
    session: MailboxSession,
    mailbox: string,
    services: ServiceRecord[],
  ): Promise<Record<string, RefreshResult>> {
    const ids = (await session.listMessageIds(mailbox)).slice(-this.options.scanLimit).reverse();
    const parsed = new Map<number, NormalizedMessage | null>();

    const load = async (id: number): Promise<NormalizedMessage | null> => {
      if (!parsed.has(id)) {
        try {
          parsed.set(id, await parseMessage(await session.fetchRaw(id)));
        } catch (error) {
          if (isMailboxError(error)) {
            throw error;
          }
          logger.debug({ messageId: id, err: describeError(error) }, 'Skipping unreadable message');
          parsed.set(id, null);
        }
      }
      return parsed.get(id) ?? null;
    };

    const results: Record<string, RefreshResult> = {};
    for (const service of services) {
      const serviceType = resolveServiceType(service);
      let result: RefreshResult = { lastUpdated: null, attributes: {} };

      for (const id of ids) {
        const message = await load(id);
        if (!message || !message.hasAttachment || !message.date) {
          continue;
        }
        const criterion = matchService(service, message);
        if (!criterion) {
          continue;
        }
        logger.debug({ serviceId: service.serviceId, messageId: id, criterion }, 'Matched message');
        result = {
          lastUpdated: message.date.toISOString(),
          attributes: extractAttributes(message.subject, message.body, serviceType),
        };
        break;
      }

      if (!result.lastUpdated) {
        logger.warn(
          { serviceId: service.serviceId, serviceName: service.serviceName, scanned: ids.length },
          'No matching message found for service',
        );
      }
      results[service.serviceId] = result;
    }

    return results;
  }
}
