import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { JsonValue } from "./types.js";

export type StopReason = "aborted" | "write_failed";

export type FrameWriter = (frame: string) => Promise<void>;

export interface KeepaliveOptions {
  intervalMs: number;
  signal: AbortSignal;
  write: FrameWriter;
}

/** The parts of `http.ServerResponse` the stream writes through. */
export interface EventStreamResponse {
  statusCode: number;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string, callback: (error: Error | null | undefined) => void): boolean;
  end(): unknown;
  on(event: "close", listener: () => void): unknown;
}

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

export function formatEvent(event: string, data: JsonValue): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export const KEEPALIVE_FRAME = formatEvent("keepalive", {});

/**
 * Emits a keepalive frame every `intervalMs` until the signal aborts or a
 * write fails. `done` resolves with the reason; it never rejects.
 */
export class KeepaliveTask {
  public readonly done: Promise<StopReason>;
  private readonly settle: (reason: StopReason) => void;
  private timer: NodeJS.Timeout | undefined;
  private stopped = false;
  private writing = false;
  private sent = 0;

  constructor(private readonly options: KeepaliveOptions) {
    let settle: (reason: StopReason) => void = () => undefined;
    this.done = new Promise<StopReason>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get keepalivesSent(): number {
    return this.sent;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  start(): void {
    if (this.stopped || this.timer) {
      return;
    }
    if (this.options.signal.aborted) {
      this.stop("aborted");
      return;
    }

    this.options.signal.addEventListener("abort", this.onAbort, { once: true });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
  }

  stop(reason: StopReason): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.options.signal.removeEventListener("abort", this.onAbort);
    this.settle(reason);
  }

  private readonly onAbort = (): void => {
    this.stop("aborted");
  };

  /** Ticks that fire while the previous write is pending are skipped. */
  private async tick(): Promise<void> {
    if (this.stopped || this.writing) {
      return;
    }
    this.writing = true;
    try {
      await this.options.write(KEEPALIVE_FRAME);
      this.sent += 1;
    } catch (error) {
      logger.info("Client disconnected", { error: errorMessage(error) });
      this.stop("write_failed");
    } finally {
      this.writing = false;
    }
  }
}

export function writeFrame(res: EventStreamResponse, frame: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (res.writableEnded || res.destroyed) {
      reject(new Error("Event stream closed"));
      return;
    }
    res.write(frame, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export interface EventStreamOptions {
  /** Payload of the `init` event. */
  init: JsonValue;
  intervalMs: number;
}

/**
 * Serve a Server-Sent-Events channel: `init`, `ready` and a first
 * `keepalive`, then keepalives on a timer. Resolves once the peer goes
 * away or a write fails.
 */
export async function openEventStream(
  res: EventStreamResponse,
  options: EventStreamOptions
): Promise<StopReason> {
  res.statusCode = 200;
  for (const [name, value] of Object.entries(SSE_HEADERS)) {
    res.setHeader(name, value);
  }
  res.flushHeaders();

  const controller = new AbortController();
  res.on("close", () => controller.abort());

  const task = new KeepaliveTask({
    intervalMs: options.intervalMs,
    signal: controller.signal,
    write: (frame) => writeFrame(res, frame),
  });

  try {
    await writeFrame(
      res,
      formatEvent("init", options.init) + formatEvent("ready", {}) + KEEPALIVE_FRAME
    );
  } catch (error) {
    logger.info("Client disconnected before stream start", {
      error: errorMessage(error),
    });
    task.stop("write_failed");
  }

  task.start();
  const reason = await task.done;
  if (!res.writableEnded && !res.destroyed) {
    res.end();
  }
  return reason;
}
