import type { Instant } from '../types/ids.js';

export const EPOCH_INSTANT: Instant = new Date(0).toISOString();

export function nowInstant(): Instant {
  return new Date().toISOString();
}

export function formatInstant(date: Date): Instant {
  return date.toISOString();
}

export function latestInstant(a: Instant, b: Instant): Instant {
  return Date.parse(b) > Date.parse(a) ? b : a;
}
