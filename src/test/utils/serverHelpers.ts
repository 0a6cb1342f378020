import type { Express } from "express";
import type { Server } from "http";

export interface RunningServer {
  server: Server;
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port and resolve once bound.
 */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server did not bind to a TCP port"));
        return;
      }
      resolve({
        server,
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done, fail) => {
          server.closeAllConnections();
          server.close((closeError?: Error) => (closeError ? fail(closeError) : done()));
        }),
      });
    });
  });
}
