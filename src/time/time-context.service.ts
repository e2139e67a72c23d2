import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface UtcWindow {
  start: string;
  end: string;
}

@Injectable()
export class TimeContextService {
  private readonly logger = new Logger(TimeContextService.name);
  readonly referenceZone: string;
  private readonly todayOverride?: string;

  constructor(private configService: ConfigService) {
    this.referenceZone = this.configService.get<string>('REFERENCE_TIMEZONE') || 'America/New_York';
    this.todayOverride = this.configService.get<string>('ASSISTANT_TODAY') || undefined;
  }

  /**
   * Current instant. With ASSISTANT_TODAY set, noon on that date in the
   * reference zone, which keeps tests clear of midnight and DST edges.
   */
  nowInReferenceZone(): Date {
    if (this.todayOverride) {
      if (parseLocalDate(this.todayOverride)) {
        return this.zonedToUtc(this.todayOverride, 12, 0);
      }
      this.logger.warn(`Ignoring malformed ASSISTANT_TODAY "${this.todayOverride}"`);
    }
    return new Date();
  }

  renderContext(): string {
    const now = this.nowInReferenceZone();
    const longDate = new Intl.DateTimeFormat('en-US', {
      timeZone: this.referenceZone,
      weekday: 'long',
      year: 'numeric',
      month: 'long',
      day: 'numeric',
    }).format(now);

    return (
      `Today's date is ${longDate} (${this.localDate(now)}) in ${this.referenceZone}. ` +
      `The current time is ${this.clock(now, this.referenceZone)} ${this.referenceZone} ` +
      `(${this.clock(now, 'UTC')} UTC). ` +
      'Always interpret relative dates such as "today", "tomorrow" or "next Monday" from this context.'
    );
  }

  /** YYYY-MM-DD of an instant, as seen in the reference zone. */
  localDate(instant: Date): string {
    const parts = zonedParts(instant, this.referenceZone);
    return `${parts.year}-${pad(parts.month)}-${pad(parts.day)}`;
  }

  formatLocal(instant: Date): string {
    return new Intl.DateTimeFormat('en-US', {
      timeZone: this.referenceZone,
      weekday: 'short',
      month: 'short',
      day: 'numeric',
      hour: 'numeric',
      minute: '2-digit',
      timeZoneName: 'short',
    }).format(instant);
  }

  /** UTC instant of a wall-clock time on a reference-zone calendar day. */
  zonedToUtc(date: string, hour: number, minute: number): Date {
    const ymd = parseLocalDate(date);
    if (!ymd) {
      throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const guess = Date.UTC(ymd.year, ymd.month - 1, ymd.day, hour, minute);
    const offset = zoneOffsetMinutes(new Date(guess), this.referenceZone);
    let result = guess - offset * 60_000;
    const corrected = zoneOffsetMinutes(new Date(result), this.referenceZone);
    if (corrected !== offset) {
      result = guess - corrected * 60_000;
    }
    return new Date(result);
  }

  /** Half-open UTC window covering one reference-zone calendar day. */
  localDayWindow(date: string): UtcWindow {
    const ymd = parseLocalDate(date);
    if (!ymd) {
      throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const next = new Date(Date.UTC(ymd.year, ymd.month - 1, ymd.day) + DAY_MS);
    const nextDate = `${next.getUTCFullYear()}-${pad(next.getUTCMonth() + 1)}-${pad(next.getUTCDate())}`;
    return {
      start: this.zonedToUtc(date, 0, 0).toISOString(),
      end: this.zonedToUtc(nextDate, 0, 0).toISOString(),
    };
  }

  private clock(instant: Date, timeZone: string): string {
    const parts = zonedParts(instant, timeZone);
    return `${pad(parts.hour)}:${pad(parts.minute)}`;
  }
}

function parseLocalDate(value: string): { year: number; month: number; day: number } | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? '0');
  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

function zoneOffsetMinutes(instant: Date, timeZone: string): number {
  const parts = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return Math.round((asUtc - wholeSeconds) / 60_000);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
