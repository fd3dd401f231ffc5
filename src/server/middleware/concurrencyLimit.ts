/**
 * Per-worker concurrency limit
 *
 * At most `limit` requests run at once in a worker; the rest wait in FIFO
 * order. A slot is freed when the response finishes or the connection
 * closes. Queued requests whose client goes away leave the queue.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { ConcurrencyStats } from "@/types";

export type ConcurrencyLimiter = RequestHandler & {
  stats(): ConcurrencyStats;
};

export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const releaseSlot = (): void => {
    const next = queue.shift();
    if (next) {
      // Hand the slot over; active count is unchanged
      next();
    } else {
      active--;
    }
  };

  const middleware = (_req: Request, res: Response, next: NextFunction): void => {
    let released = false;
    const release = (): void => {
      if (!released) {
        released = true;
        releaseSlot();
      }
    };

    const start = (): void => {
      res.off("close", abandon);
      res.once("finish", release);
      res.once("close", release);
      next();
    };

    const abandon = (): void => {
      const index = queue.indexOf(start);
      if (index !== -1) {
        queue.splice(index, 1);
      }
    };

    if (active < limit) {
      active++;
      start();
    } else {
      res.once("close", abandon);
      queue.push(start);
    }
  };

  return Object.assign(middleware, {
    stats: (): ConcurrencyStats => ({ active, queued: queue.length, limit }),
  });
}
