import http from 'node:http';
import { logger } from '../logger.js';
import { presentService, presentStatus } from '../pipeline/present/state.js';
import type { AppDb } from '../storage/db.js';
import type { MailboxSettings } from '../types.js';

type MailboxLookup = () => Pick<MailboxSettings, 'user' | 'host' | 'port'> | null;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' }).end(JSON.stringify(body));
}

/** Read-only view of the stored refresh state. */
export function createServer(db: AppDb, mailbox: MailboxLookup) {
  return http.createServer((req, res) => {
    try {
      if (!req.url || !req.method) {
        res.writeHead(400).end('Bad request');
        return;
      }

      const { pathname } = new URL(req.url, 'http://localhost');

      if (req.method === 'GET' && pathname === '/status') {
        sendJson(res, 200, presentStatus(db.getRefreshSnapshot(), db.listServices(), mailbox()));
        return;
      }

      if (req.method === 'GET' && pathname.startsWith('/services/')) {
        const serviceId = decodeURIComponent(pathname.slice('/services/'.length));
        const service = db.getService(serviceId);
        if (!service) {
          sendJson(res, 404, { error: `Unknown service: ${serviceId}` });
          return;
        }
        sendJson(res, 200, presentService(service, db.getRefreshSnapshot().services[serviceId]));
        return;
      }

      res.writeHead(404).end('Not found');
    } catch (error) {
      logger.error({ err: error, url: req.url }, 'Request failed');
      res.writeHead(500).end(String(error));
    }
  });
}
