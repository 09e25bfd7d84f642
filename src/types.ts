export const SERVICE_TYPES = ['water', 'gas', 'electricity', 'telecom', 'unknown'] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

export function isServiceType(value: unknown): value is ServiceType {
  return SERVICE_TYPES.some((type) => type === value);
}

export interface DetectedService {
  serviceName: string;
  serviceId: string;
  serviceType: ServiceType;
  sampleSubject: string;
  sampleFrom: string;
  emailCount: number;
}

export interface ServiceRecord {
  serviceId: string;
  serviceName: string;
  serviceType: ServiceType;
  sampleFrom: string;
  sampleSubject: string;
}

export type AttributeValue = string | string[];

/** Final attribute set: absent fields are simply missing keys. */
export type ExtractedAttributes = Record<string, AttributeValue>;

/**
 * Output of a type-specific extractor. `null` is an explicit absence and
 * removes the key from the generic result when merged.
 */
export type AttributePatch = Record<string, AttributeValue | null>;

export interface RefreshResult {
  /** ISO timestamp of the matched message, `null` when nothing matched. */
  lastUpdated: string | null;
  attributes: ExtractedAttributes;
}

export type ConnectionStatus = 'OK' | 'Problem';

export interface RefreshSnapshot {
  connectionStatus: ConnectionStatus;
  checkedAt: string | null;
  errorKind: 'connection' | 'auth' | null;
  errorMessage: string | null;
  services: Record<string, RefreshResult>;
}

export interface MailboxSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox: string;
}

export interface NormalizedMessage {
  from: string;
  subject: string;
  date: Date | null;
  body: string;
  hasAttachment: boolean;
}
