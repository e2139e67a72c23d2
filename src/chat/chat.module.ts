import { Module } from '@nestjs/common';
import { BookingModule } from '../booking/booking.module';
import { LlmModule } from '../llm/llm.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { TimeModule } from '../time/time.module';
import { ChatSessionService } from './chat-session.service';
import { ChatController } from './chat.controller';

@Module({
  imports: [TimeModule, BookingModule, SchedulingModule, LlmModule],
  controllers: [ChatController],
  providers: [ChatSessionService],
  exports: [ChatSessionService],
})
export class ChatModule {}
