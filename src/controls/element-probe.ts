import { WAIT_DEFAULTS } from '../common/constants';
import { pollUntil, secondsToMs } from '../common/utils/poll.util';

export type StateReader = () => Promise<boolean>;

/**
 * One boolean state of an element (present, enabled, ...), readable at once
 * or awaited with a bounded poll. A timed out wait resolves to false.
 */
export class ElementProbe {
  constructor(
    readonly name: string,
    private readonly read: StateReader,
  ) {}

  get(): Promise<boolean> {
    return this.read();
  }

  waitIsTrue(
    timeoutSeconds: number,
    pollIntervalMs: number = WAIT_DEFAULTS.POLL_INTERVAL_MS,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return pollUntil(this.read, {
      timeoutMs: secondsToMs(timeoutSeconds),
      intervalMs: pollIntervalMs,
      signal,
    });
  }

  waitIsFalse(
    timeoutSeconds: number,
    pollIntervalMs: number = WAIT_DEFAULTS.POLL_INTERVAL_MS,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return pollUntil(async () => !(await this.read()), {
      timeoutMs: secondsToMs(timeoutSeconds),
      intervalMs: pollIntervalMs,
      signal,
    });
  }
}
