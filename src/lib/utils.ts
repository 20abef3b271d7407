import { config } from './config';

export function formatPercentage(value: number, decimals: number = 1): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

export function formatScore(value: number): string {
  return value.toFixed(1);
}

export function formatDateTime(date: string | Date, timeZone: string = config.appTimezone): string {
  const d = new Date(date);
  return new Intl.DateTimeFormat('en-US', {
    dateStyle: 'short',
    timeStyle: 'medium',
    timeZone,
  }).format(d);
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in the given time zone
 */
export function toEventDate(date: string | Date, timeZone: string = config.appTimezone): string {
  const d = new Date(date);
  return new Intl.DateTimeFormat('en-CA', {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    timeZone,
  }).format(d);
}
