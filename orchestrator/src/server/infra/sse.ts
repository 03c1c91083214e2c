import type { Request, Response } from "express";

interface SetupSseOptions {
  disableBuffering?: boolean;
  flushHeaders?: boolean;
}

const DEFAULT_HEARTBEAT_MS = 30_000;

export function setupSse(res: Response, options: SetupSseOptions = {}): void {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");

  if (options.disableBuffering) {
    res.setHeader("X-Accel-Buffering", "no");
  }

  if (options.flushHeaders) {
    res.flushHeaders();
  }
}

export function writeSseData(
  res: Response,
  data: unknown,
  event?: string,
): void {
  const prefix = event ? `event: ${event}\n` : "";
  res.write(`${prefix}data: ${JSON.stringify(data)}\n\n`);
}

export function writeSseComment(res: Response, comment: string): void {
  res.write(`: ${comment}\n\n`);
}

export function startSseHeartbeat(
  res: Response,
  intervalMs = DEFAULT_HEARTBEAT_MS,
): () => void {
  const heartbeat = setInterval(() => {
    writeSseComment(res, "heartbeat");
  }, intervalMs);

  return () => {
    clearInterval(heartbeat);
  };
}

/**
 * Streams every value from `subscribe` to the client until it disconnects.
 */
export function streamSse<T>(
  req: Request,
  res: Response,
  subscribe: (listener: (value: T) => void) => () => void,
): void {
  setupSse(res, { disableBuffering: true, flushHeaders: true });
  const unsubscribe = subscribe((value) => writeSseData(res, value));
  const stopHeartbeat = startSseHeartbeat(res);

  req.on("close", () => {
    stopHeartbeat();
    unsubscribe();
  });
}
