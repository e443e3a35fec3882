const counters = new Map<string, number>();

export type CounterName =
  | 'booking_created'
  | 'booking_updated'
  | 'booking_cancelled'
  | 'booking_rejected'
  | 'side_effect_failed'
  | 'reminder_scheduled'
  | 'reminder_sent'
  | 'reminder_skipped';

export function incrementCounter(name: CounterName, by = 1): void {
  counters.set(name, (counters.get(name) ?? 0) + by);
}

export function getCounter(name: CounterName): number {
  return counters.get(name) ?? 0;
}

export function snapshotCounters(): Record<string, number> {
  return Object.fromEntries(counters);
}

export function resetCounters(): void {
  counters.clear();
}
