import { Scheduler } from '../../src/common/scheduling';

/** Records every requested sleep and resolves immediately. */
export class FakeScheduler implements Scheduler {
  readonly sleeps: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }
}
