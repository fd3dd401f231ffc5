/**
 * HTTP server lifecycle for one worker
 */

import * as http from "http";
import type { Express } from "express";
import type { AppConfig, Logger } from "@/types";

/**
 * Longest wait for request headers; kept below the request timeout
 */
const MAX_HEADERS_TIMEOUT_MS = 60_000;

/**
 * Bind the app to the configured host/port.
 *
 * Node's own requestTimeout bounds how long a client may take to send the
 * request; the requestTimeout middleware bounds the handler.
 */
export function listen(app: Express, config: AppConfig, log: Logger): Promise<http.Server> {
  const server = http.createServer(
    {
      requestTimeout: config.requestTimeoutMs,
      headersTimeout: Math.min(MAX_HEADERS_TIMEOUT_MS, config.requestTimeoutMs),
    },
    app,
  );

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(config.port, config.host, () => {
      server.off("error", onError);
      server.on("error", (err) => {
        log.error("HTTP server error", { error: err.message });
      });
      resolve(server);
    });
  });
}

/**
 * Port the server actually bound (differs from config when port 0 is used)
 */
export function boundPort(server: http.Server): number {
  const address = server.address();
  return address !== null && typeof address === "object" ? address.port : 0;
}

/**
 * Stop accepting connections and wait for in-flight requests
 */
export function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}
