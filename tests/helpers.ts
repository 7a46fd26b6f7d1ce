import fs from 'fs/promises';
import type { Server } from 'http';
import os from 'os';
import path from 'path';

export const patternBytes = (length: number): Buffer => {
  const buffer = Buffer.alloc(length);
  for (let i = 0; i < length; i++) buffer[i] = i % 251;
  return buffer;
};

export const makeTempDir = async (): Promise<string> =>
  fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'homereel-')));

export const writeFile = async (root: string, relativePath: string, content: Buffer | string): Promise<string> => {
  const fullPath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content);
  return fullPath;
};

export const collect = async (chunks: AsyncIterable<Buffer>): Promise<Buffer> => {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) parts.push(chunk);
  return Buffer.concat(parts);
};

export const listenOnLoopback = async (server: Server): Promise<string> => {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
  return `http://127.0.0.1:${address.port}`;
};

export const closeServer = async (server: Server): Promise<void> => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
};
