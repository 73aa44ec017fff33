import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SchedulingModule } from './common/scheduling';
import { validate } from './config/env.validation';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    SchedulingModule,
    PipelineModule,
  ],
})
export class AppModule {}
