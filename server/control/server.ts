import { createServer, type Server } from "node:http";
import type express from "express";
import { createLogger } from "../utils/log";

const log = createLogger("control");

export type ControlServerHandle = {
  server: Server;
  port: number;
  close(): Promise<void>;
};

export const startControlServer = (app: express.Express, port: number, host: string): Promise<ControlServerHandle> =>
  new Promise((resolve, reject) => {
    const server = createServer(app);
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      server.on("error", (error) => log.error("control server error", error));
      const address = server.address();
      const boundPort = typeof address === "object" && address ? address.port : port;
      log.info(`control plane listening on http://${host}:${boundPort}`);
      let closing: Promise<void> | null = null;
      resolve({
        server,
        port: boundPort,
        close: () => {
          closing ??= new Promise<void>((done) => {
            server.close((error) => {
              if (error) log.warn("control server close reported an error", error);
              done();
            });
            server.closeAllConnections();
          });
          return closing;
        },
      });
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
