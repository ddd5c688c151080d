import { errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

/**
 * Single FIFO worker for every browser-driver call.
 *
 * The driver is not safe for interleaved use, so tasks run strictly one after
 * another in submission order. A failing task rejects its own caller only.
 */
export class DriverWorker {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private stopped = false;
  private readonly log = getLogger().child({ component: 'DriverWorker' });

  /** Tasks submitted and not yet settled. */
  get queued(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.stopped) {
      return Promise.reject(new Error('DriverWorker is stopped.'));
    }
    this.pending++;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => undefined,
      (err: unknown) => {
        this.log.debug('Driver task failed', { error: errorMessage(err) });
      },
    );
    return result.finally(() => {
      this.pending--;
    });
  }

  /** Refuse new tasks and wait for queued ones to settle. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.tail;
  }
}
