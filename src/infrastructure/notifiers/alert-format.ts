import type { AlertEvent } from '../../domain/entities/alert.entity';

export function formatTimestamp(date: Date) {
  return date.toISOString().replace('T', ' ').slice(0, 19) + ' UTC';
}

export function formatPlain(event: AlertEvent) {
  return `[${event.reason}] ${event.symbol} @ ${formatTimestamp(event.createdAt)}\n${event.message}`;
}

function escapeHtml(text: string) {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatHtml(event: AlertEvent) {
  return [
    `<b>${escapeHtml(event.reason)}</b> · <b>${escapeHtml(event.symbol)}</b>`,
    escapeHtml(event.message),
    `<i>${formatTimestamp(event.createdAt)}</i>`,
  ].join('\n');
}
