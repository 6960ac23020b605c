import { Module } from '@nestjs/common';
import { PipelineModule } from '@orderflow/shared';
import { SERVICE_DEFAULTS } from './constants';
import { DeadLettersController } from './dead-letters.controller';
import { QueuesController } from './queues.controller';

@Module({
  imports: [PipelineModule.forService(SERVICE_DEFAULTS)],
  controllers: [DeadLettersController, QueuesController],
})
export class AppModule {}
