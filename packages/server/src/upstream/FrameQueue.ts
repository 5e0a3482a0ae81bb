/**
 * Buffers what an upstream WebSocket emits so a read loop can pull it one
 * item at a time with a deadline.
 *
 * Socket listeners push; the read loop awaits {@link FrameQueue.next}. Once a
 * close or error has been pushed the queue is ended and later pushes are
 * dropped, so the loop sees exactly one terminal signal.
 */

export type FrameSignal =
  | { kind: "frame"; data: string }
  | { kind: "closed"; code: number; reason: string }
  | { kind: "error"; error: Error };

export type FrameQueueItem = FrameSignal | { kind: "timeout" };

export class FrameQueue {
  private queue: FrameSignal[] = [];
  private waiting: ((signal: FrameSignal) => void) | null = null;
  private ended = false;

  /**
   * Push a frame or terminal signal.
   * If the read loop is waiting, resolves it immediately.
   */
  push(signal: FrameSignal): void {
    if (this.ended) return;
    if (signal.kind !== "frame") {
      this.ended = true;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(signal);
      return;
    }
    this.queue.push(signal);
  }

  /**
   * Next buffered item, or wait up to `timeoutMs` for one.
   */
  next(timeoutMs: number): Promise<FrameQueueItem> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);

    if (timeoutMs <= 0) {
      return Promise.resolve({ kind: "timeout" });
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiting = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);

      this.waiting = (signal) => {
        clearTimeout(timer);
        resolve(signal);
      };
    });
  }

  /** Whether a close or error has been pushed */
  get isEnded(): boolean {
    return this.ended;
  }

  /** Number of items waiting to be read */
  get depth(): number {
    return this.queue.length;
  }
}
