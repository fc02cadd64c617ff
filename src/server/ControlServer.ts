import http, { IncomingMessage, ServerResponse } from 'http';
import { parse } from 'url';
import type { BotSettings } from '../core/Config';
import { createLogger, errorMessage } from '../core/Logger';
import type { FarmingSnapshot } from '../farming/FarmingBehavior';
import type { KillEvent } from '../farming/Statistics';

const Logger = createLogger('Server');

export interface BotStatus {
  running: boolean;
  state: string;
}

export type ServerEvent =
  | ({ type: 'status' } & BotStatus)
  | { type: 'kill'; kill: KillEvent }
  | { type: 'config' };

export interface Controls {
  getStatus: () => BotStatus;
  getSnapshot: () => FarmingSnapshot;
  start: () => Promise<void> | void;
  stop: () => Promise<void> | void;
  getConfig: () => BotSettings;
  setConfig: (patch: unknown) => Promise<void>;
}

export interface ControlServer {
  server: http.Server;
  notify(event: ServerEvent): void;
  close(): Promise<void>;
}

// Infinity (нет маркера) в JSON превращаем в null.
function toJson(value: unknown): string {
  return JSON.stringify(value, (_k, v: unknown) => (typeof v === 'number' && !Number.isFinite(v) ? null : v));
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(toJson(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (c: Buffer) => (body += c.toString()));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

/**
 * JSON API и поток событий (SSE) для внешней панели: статус, снимок восприятия, старт/стоп, конфиг.
 */
export function startControlServer(port: number, controls: Controls): ControlServer {
  const clients: ServerResponse[] = [];

  function notify(event: ServerEvent): void {
    const str = toJson(event);
    for (const res of clients.slice()) {
      try {
        res.write(`data: ${str}\n\n`);
      } catch (e) {
        Logger.debug(`SSE клиент отвалился: ${errorMessage(e)}`);
        clients.splice(clients.indexOf(res), 1);
      }
    }
  }

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = parse(req.url || '/');

    // CORS for convenience
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') { res.statusCode = 204; res.end(); return; }

    if (pathname === '/api/events') {
      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      clients.push(res);
      res.write(`data: ${toJson({ type: 'status', ...controls.getStatus() })}\n\n`);
      req.on('close', () => {
        const i = clients.indexOf(res);
        if (i >= 0) clients.splice(i, 1);
      });
      return;
    }

    if (pathname === '/api/status' && req.method === 'GET') {
      sendJson(res, 200, { ...controls.getStatus(), snapshot: controls.getSnapshot() });
      return;
    }

    if ((pathname === '/api/start' || pathname === '/api/stop') && req.method === 'POST') {
      if (pathname === '/api/start') await controls.start();
      else await controls.stop();
      sendJson(res, 200, { ok: true });
      notify({ type: 'status', ...controls.getStatus() });
      return;
    }

    if (pathname === '/api/config' && req.method === 'GET') {
      sendJson(res, 200, controls.getConfig());
      return;
    }

    if (pathname === '/api/config' && req.method === 'POST') {
      let patch: unknown;
      try {
        const body = await readBody(req);
        patch = body ? JSON.parse(body) : {};
      } catch (e) {
        sendJson(res, 400, { ok: false, error: errorMessage(e) });
        return;
      }
      await controls.setConfig(patch);
      sendJson(res, 200, { ok: true });
      notify({ type: 'config' });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  }

  const server = http.createServer((req, res) => {
    route(req, res).catch((e: unknown) => {
      Logger.error(`${req.method} ${req.url}: ${errorMessage(e)}`);
      if (!res.headersSent) sendJson(res, 500, { ok: false, error: errorMessage(e) });
      else res.end();
    });
  });

  server.listen(port, () => {
    Logger.info(`control server listening on http://localhost:${port}`);
  });

  return {
    server,
    notify,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const c of clients.splice(0)) c.end();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
