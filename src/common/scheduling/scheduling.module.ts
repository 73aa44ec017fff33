import { Global, Module } from '@nestjs/common';
import { SCHEDULER, SystemScheduler } from './scheduler';

@Global()
@Module({
  providers: [{ provide: SCHEDULER, useClass: SystemScheduler }],
  exports: [SCHEDULER],
})
export class SchedulingModule {}
