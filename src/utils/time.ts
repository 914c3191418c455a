export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export class AbortedError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export function isAbortedError(error: unknown): boolean {
  return error instanceof AbortedError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
