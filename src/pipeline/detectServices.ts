import { logger } from '../logger.js';
import type { MailboxTransport } from '../connectors/types.js';
import type { AppDb } from '../storage/db.js';
import type { DetectedService, MailboxSettings } from '../types.js';
import { detectServices } from './detect/detector.js';

export class ServiceDetectionService {
  constructor(
    private readonly db: AppDb,
    private readonly transport: MailboxTransport,
  ) {}

  /** Runs one detection pass and stores its result in place of the previous one. */
  async detect(settings: MailboxSettings, scanLimit: number): Promise<DetectedService[]> {
    const start = Date.now();
    const session = await this.transport.open(settings);
    let detected: DetectedService[];
    try {
      detected = await detectServices(session, settings.mailbox, scanLimit);
    } finally {
      await session.close();
    }

    this.db.replaceDetectedServices(detected);
    logger.info({ detected: detected.length, totalMs: Date.now() - start }, 'Detected services stored');
    return detected;
  }
}
