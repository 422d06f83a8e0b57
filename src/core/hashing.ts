import { sha256 } from '../crypto';
import { NotificationDraft } from '../types';

export function sortObjectKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }

  const record = value as Record<string, unknown>;
  const sorted: Record<string, unknown> = {};
  const keys = Object.keys(record).sort();

  for (const key of keys) {
    sorted[key] = sortObjectKeys(record[key]);
  }

  return sorted;
}

export function canonicalSerialize(value: unknown): string {
  return JSON.stringify(sortObjectKeys(value) ?? null);
}

/**
 * Message a caller signs for a mutating API request.
 */
export function requestSigningMessage(
  method: string,
  url: string,
  timestamp: number,
  body: unknown
): string {
  return `${method.toUpperCase()}:${url}:${timestamp}:${canonicalSerialize(body ?? {})}`;
}

export function calculateNotificationId(
  sequence: number,
  notification: NotificationDraft
): string {
  return sha256(canonicalSerialize({ sequence, ...notification }));
}
