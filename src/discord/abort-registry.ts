// Maps Discord message ids (a trigger and the replies streamed for it) to the
// AbortController of the stream that owns them. Deleting any of those messages
// stops the stream.

export type AbortHandle = {
  /** Pass to the completion request and the streamer. */
  signal: AbortSignal;
  /** Also abort this stream when `messageId` is deleted. */
  track: (messageId: string) => void;
  /** Call when the stream ends; forgets every tracked id. */
  dispose: () => void;
};

export class AbortRegistry {
  private readonly active = new Map<string, AbortController>();

  /** Register a stream answering `triggerId`. */
  register(triggerId: string): AbortHandle {
    const controller = new AbortController();
    const ids = new Set<string>();

    const track = (messageId: string) => {
      ids.add(messageId);
      this.active.set(messageId, controller);
    };
    track(triggerId);

    const dispose = () => {
      for (const id of ids) {
        if (this.active.get(id) === controller) this.active.delete(id);
      }
      ids.clear();
    };

    return { signal: controller.signal, track, dispose };
  }

  /**
   * Abort the stream owning `messageId`.
   * Returns false when no active stream tracks it.
   */
  tryAbort(messageId: string): boolean {
    const controller = this.active.get(messageId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  isActivelyStreaming(messageId: string): boolean {
    const controller = this.active.get(messageId);
    return controller !== undefined && !controller.signal.aborted;
  }

  /**
   * Abort every active stream. Returns how many were aborted. Each stream's
   * own `dispose()` still does the cleanup.
   */
  tryAbortAll(): number {
    const controllers = new Set(this.active.values());
    let count = 0;
    for (const controller of controllers) {
      if (controller.signal.aborted) continue;
      controller.abort();
      count++;
    }
    return count;
  }
}
