import { Module } from '@nestjs/common';
import { TimeContextService } from './time-context.service';

@Module({
  providers: [TimeContextService],
  exports: [TimeContextService],
})
export class TimeModule {}
