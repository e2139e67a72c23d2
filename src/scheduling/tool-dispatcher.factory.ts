import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingBackendAdapter } from '../booking/booking-backend.adapter';
import { TimeContextService } from '../time/time-context.service';
import { ToolDispatcher } from './tool-dispatcher';

@Injectable()
export class ToolDispatcherFactory {
  constructor(
    private configService: ConfigService,
    private timeContext: TimeContextService,
  ) {}

  create(adapter: BookingBackendAdapter): ToolDispatcher {
    const pinned = Number(this.configService.get<string | number>('CALCOM_EVENT_TYPE_ID'));
    return new ToolDispatcher(adapter, this.timeContext, {
      pinnedEventTypeId: Number.isInteger(pinned) && pinned > 0 ? pinned : undefined,
    });
  }
}
