export interface Deadline {
  readonly signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * One signal for a whole switch: aborts after `timeoutMs`, or when `parent`
 * aborts, whichever comes first.
 */
export function createDeadline(timeoutMs?: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(new Error(`switch timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
