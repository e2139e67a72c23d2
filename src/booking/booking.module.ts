import { Module } from '@nestjs/common';
import { TimeModule } from '../time/time.module';
import { BookingBackendFactory } from './booking-backend.factory';

@Module({
  imports: [TimeModule],
  providers: [BookingBackendFactory],
  exports: [BookingBackendFactory],
})
export class BookingModule {}
