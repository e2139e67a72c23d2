import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { TimeContextService } from '../time/time-context.service';
import { BookingBackendAdapter } from './booking-backend.adapter';
import { BookingHttpClient } from './booking-http.client';
import { CalComGenerations } from './api-generations';

/** Builds one adapter per chat session so no guard or cache is shared between users. */
@Injectable()
export class BookingBackendFactory {
  constructor(
    private configService: ConfigService,
    private timeContext: TimeContextService,
  ) {}

  create(): BookingBackendAdapter {
    const apiKey = this.configService.get<string>('CALCOM_API_KEY');
    if (!apiKey) {
      throw new Error('CALCOM_API_KEY is required');
    }
    const timeoutMs = Number(this.configService.get<string | number>('HTTP_TIMEOUT_MS') ?? 15000);

    const client = new BookingHttpClient(axios.create(), { timeoutMs });
    const api = new CalComGenerations({
      apiKey,
      v2BaseUrl: this.configService.get<string>('CALCOM_V2_BASE_URL') || 'https://api.cal.com/v2',
      v1BaseUrl: this.configService.get<string>('CALCOM_V1_BASE_URL') || 'https://api.cal.com/v1',
    });
    return new BookingBackendAdapter(client, api, this.timeContext, {
      defaultTimeZone: this.timeContext.referenceZone,
      defaultLanguage: 'en',
    });
  }
}
