import type { Logger } from '../logging/Logger';

/**
 * Runs tasks one at a time in submission order. Every state-machine step
 * goes through here, so transport callbacks, timers and user commands never
 * interleave.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly logger: Logger) {}

  public run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.catch(() => undefined);
    return result;
  }

  public post(task: () => void): void {
    this.run(task).catch(error => {
      this.logger.error('Signaling task failed', error);
    });
  }

  public idle(): Promise<void> {
    return this.run(() => undefined);
  }
}
