import { Injectable } from '@nestjs/common';

export const SCHEDULER = 'SCHEDULER';

export interface Scheduler {
  sleep(ms: number): Promise<void>;
}

@Injectable()
export class SystemScheduler implements Scheduler {
  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
