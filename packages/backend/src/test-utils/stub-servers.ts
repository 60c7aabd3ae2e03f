/**
 * 测试用的进程内服务：上游 stub、CONNECT 代理、自签名 HTTPS
 */

import fs from 'fs';
import http from 'http';
import https from 'https';
import net from 'net';
import path from 'path';
import { fileURLToPath } from 'url';

const fixturesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../lib/__tests__/fixtures');

export const TEST_CERT_PATH = path.join(fixturesDir, 'localhost.crt');
export const TEST_KEY_PATH = path.join(fixturesDir, 'localhost.key');

export interface RunningServer {
  port: number;
  url: string;
  close(): Promise<void>;
}

async function listen(server: net.Server): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

function trackSockets(server: net.Server): () => void {
  const sockets = new Set<net.Socket>();
  server.on('connection', (socket: net.Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  return () => {
    for (const socket of sockets) socket.destroy();
  };
}

async function closeServer(server: net.Server, destroySockets: () => void): Promise<void> {
  destroySockets();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function startHttpServer(handler: http.RequestListener): Promise<RunningServer> {
  const server = http.createServer(handler);
  const destroySockets = trackSockets(server);
  const port = await listen(server);
  return {
    port,
    url: `http://127.0.0.1:${port}`,
    close: () => closeServer(server, destroySockets),
  };
}

export async function startHttpsServer(handler: http.RequestListener): Promise<RunningServer> {
  const server = https.createServer(
    { cert: fs.readFileSync(TEST_CERT_PATH), key: fs.readFileSync(TEST_KEY_PATH) },
    handler
  );
  const destroySockets = trackSockets(server);
  const port = await listen(server);
  return {
    port,
    url: `https://127.0.0.1:${port}`,
    close: () => closeServer(server, destroySockets),
  };
}

export interface RunningProxy extends RunningServer {
  /** 收到的 CONNECT 目标（host:port） */
  tunnels: string[];
}

/**
 * 只支持 CONNECT 的 HTTP 代理
 */
export async function startConnectProxy(): Promise<RunningProxy> {
  const tunnels: string[] = [];
  const server = http.createServer((_req, res) => {
    res.writeHead(405).end();
  });
  const upstreamSockets = new Set<net.Socket>();

  server.on('connect', (req: http.IncomingMessage, clientSocket: net.Socket, head: Buffer) => {
    const target = req.url ?? '';
    tunnels.push(target);
    const [host, port] = target.split(':');
    const upstream = net.connect(Number(port), host, () => {
      clientSocket.write('HTTP/1.1 200 Connection Established\r\n\r\n');
      if (head.length > 0) upstream.write(head);
      upstream.pipe(clientSocket);
      clientSocket.pipe(upstream);
    });
    upstreamSockets.add(upstream);
    upstream.on('close', () => upstreamSockets.delete(upstream));
    upstream.on('error', () => clientSocket.destroy());
    clientSocket.on('error', () => upstream.destroy());
  });

  const destroySockets = trackSockets(server);
  const port = await listen(server);
  return {
    port,
    url: `http://127.0.0.1:${port}`,
    tunnels,
    close: () =>
      closeServer(server, () => {
        for (const socket of upstreamSockets) socket.destroy();
        destroySockets();
      }),
  };
}

/**
 * 拿一个确定没有人监听的端口
 */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

export async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}
