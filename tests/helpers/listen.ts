import { Server } from 'http';
import { AddressInfo } from 'net';
import type { Express } from 'express';

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Starts the app on an ephemeral loopback port. */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }
      const { port }: AddressInfo = address;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done, fail) => server.close((error) => (error ? fail(error) : done()))),
      });
    });
    server.on('error', reject);
  });
}
