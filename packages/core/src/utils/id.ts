import { randomUUID } from 'crypto';

/** Unique identifier for an event. */
export function generateEventId(): string {
  return randomUUID();
}

/**
 * Generates a sortable, human-readable identifier for a debate session,
 * e.g. `deb-20240115-143005-k3f9`.
 */
export function generateDebateId(now: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  const yyyy = now.getFullYear();
  const MM = pad(now.getMonth() + 1);
  const dd = pad(now.getDate());
  const hh = pad(now.getHours());
  const mm = pad(now.getMinutes());
  const ss = pad(now.getSeconds());
  const rand = Math.random().toString(36).slice(2, 6);
  return `deb-${yyyy}${MM}${dd}-${hh}${mm}${ss}-${rand}`;
}
