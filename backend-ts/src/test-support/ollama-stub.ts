/**
 * In-process stand-in for an Ollama server, listening on a loopback port.
 */

import { createServer } from 'http';

export interface StubRequest {
  method: string;
  url: string;
  body: unknown;
}

export interface StubReply {
  status?: number;
  body?: unknown;
  /** Sent verbatim instead of `body` */
  raw?: string;
  delayMs?: number;
  /** Never answer */
  hang?: boolean;
}

export type StubHandler = (request: StubRequest) => StubReply;

export interface OllamaStub {
  endpoint: string;
  requests: StubRequest[];
  close(): Promise<void>;
}

/**
 * The `prompt` field of a recorded /api/generate body.
 */
export function promptOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'prompt' in body && typeof body.prompt === 'string') {
    return body.prompt;
  }
  return '';
}

export async function startOllamaStub(handler: StubHandler): Promise<OllamaStub> {
  const requests: StubRequest[] = [];
  const timers = new Set<NodeJS.Timeout>();

  const server = createServer((req, res) => {
    let raw = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      raw += chunk;
    });
    req.on('end', () => {
      const body: unknown = raw ? JSON.parse(raw) : undefined;
      const request = { method: req.method ?? 'GET', url: req.url ?? '/', body };
      requests.push(request);

      const reply = handler(request);
      if (reply.hang) {
        return;
      }

      const send = () => {
        res.writeHead(reply.status ?? 200, { 'Content-Type': 'application/json' });
        res.end(reply.raw ?? JSON.stringify(reply.body ?? {}));
      };

      if (reply.delayMs) {
        const timer = setTimeout(() => {
          timers.delete(timer);
          send();
        }, reply.delayMs);
        timers.add(timer);
      } else {
        send();
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stub server did not bind to a TCP port');
  }

  return {
    endpoint: `http://127.0.0.1:${address.port}`,
    requests,
    close: async () => {
      if (!server.listening) {
        return;
      }
      timers.forEach((timer) => clearTimeout(timer));
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    },
  };
}
