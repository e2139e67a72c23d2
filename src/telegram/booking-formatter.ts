import { Booking, BookingDisplayStatus, EventCategory } from '../common/types';

const STATUS_BADGES: Record<BookingDisplayStatus, string> = {
  cancelled: '❌ Cancelled',
  pending: '⏳ Pending',
  past: '✔️ Past',
  today: '🔴 Today',
  this_week: '🟡 This week',
  upcoming: '🟢 Upcoming',
};

function statusBadge(status: BookingDisplayStatus): string {
  return STATUS_BADGES[status];
}

export function formatBooking(booking: Booking): string {
  const lines = [`${statusBadge(booking.displayStatus)} · ${booking.title}`, `🕐 ${booking.localTime}`, `🆔 ${booking.uid}`];
  if (booking.joinUrl) lines.push(`🔗 Join: ${booking.joinUrl}`);
  if (booking.rescheduleUrl) lines.push(`↪️ Reschedule: ${booking.rescheduleUrl}`);
  if (booking.cancelUrl) lines.push(`🗑 Cancel: ${booking.cancelUrl}`);
  return lines.join('\n');
}

export function formatBookingList(bookings: Booking[], limit = 10): string {
  if (bookings.length === 0) {
    return '📭 No bookings found.';
  }
  const shown = bookings.slice(0, limit).map(formatBooking).join('\n\n');
  const more = bookings.length > limit ? `\n\n…and ${bookings.length - limit} more.` : '';
  return `📅 Bookings (${bookings.length}):\n\n${shown}${more}`;
}

export function formatCategories(categories: EventCategory[]): string {
  if (categories.length === 0) {
    return '📭 No meeting types are available.';
  }
  const lines = categories.map((category) => {
    const length = category.lengthInMinutes ? ` (${category.lengthInMinutes} min)` : '';
    return `• ${category.title}${length}, id ${category.id}`;
  });
  return `📋 Meeting types:\n${lines.join('\n')}`;
}
