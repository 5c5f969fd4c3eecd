export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  run: () => Promise<T>;
}

/**
 * Races `run` against a timer. The underlying call is not aborted; its
 * eventual result is ignored once the timer has fired.
 */
export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(input.label, input.timeoutMs)), input.timeoutMs);
  });

  try {
    return await Promise.race([input.run(), expired]);
  } finally {
    clearTimeout(timer);
  }
}
