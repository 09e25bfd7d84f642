import type { MailboxSettings, RefreshResult, RefreshSnapshot, ServiceRecord } from '../../types.js';

export type StateAttribute = string | number | string[] | null;

export interface EntityState {
  state: string | null;
  attributes: Record<string, StateAttribute>;
}

export interface StatusView {
  connection: EntityState;
  services: Record<string, EntityState>;
}

/** Keys starting with `_` carry extraction diagnostics and are never shown. */
export function isInternalKey(key: string): boolean {
  return key.startsWith('_');
}

export function presentConnection(
  snapshot: RefreshSnapshot,
  mailbox: Pick<MailboxSettings, 'user' | 'host' | 'port'> | null,
): EntityState {
  return {
    state: snapshot.connectionStatus,
    attributes: {
      email: mailbox?.user ?? null,
      imap_server: mailbox?.host ?? null,
      imap_port: mailbox?.port ?? null,
      last_checked: snapshot.checkedAt,
      error_kind: snapshot.errorKind,
      error_message: snapshot.errorMessage,
    },
  };
}

export function presentService(service: ServiceRecord, result: RefreshResult | undefined): EntityState {
  const lastUpdated = result?.lastUpdated ?? null;
  const visible = Object.entries(result?.attributes ?? {}).filter(([key]) => !isInternalKey(key));

  return {
    state: lastUpdated ? lastUpdated.slice(0, 10) : null,
    attributes: {
      service_id: service.serviceId,
      service_name: service.serviceName,
      service_type: service.serviceType,
      last_updated_datetime: lastUpdated,
      ...Object.fromEntries(visible),
      attributes_extracted_count: visible.length,
    },
  };
}

export function presentStatus(
  snapshot: RefreshSnapshot,
  services: ServiceRecord[],
  mailbox: Pick<MailboxSettings, 'user' | 'host' | 'port'> | null,
): StatusView {
  return {
    connection: presentConnection(snapshot, mailbox),
    services: Object.fromEntries(
      services.map((service) => [service.serviceId, presentService(service, snapshot.services[service.serviceId])]),
    ),
  };
}
