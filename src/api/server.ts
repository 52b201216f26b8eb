import type { Server } from "node:http";
import type { Express } from "express";
import type { Logger } from "../core/logger.js";

/** Listen and resolve once the socket is bound. */
export function listen(app: Express, host: string, port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      logger.info("listening", { host, port });
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
