import { Module } from '@nestjs/common';
import { TimeModule } from '../time/time.module';
import { ToolDispatcherFactory } from './tool-dispatcher.factory';

@Module({
  imports: [TimeModule],
  providers: [ToolDispatcherFactory],
  exports: [ToolDispatcherFactory],
})
export class SchedulingModule {}
