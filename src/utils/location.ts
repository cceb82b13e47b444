/**
 * Location stream helpers
 */

import { LocationFix } from '../types/navigation.js';

/** Shape of a location message from the glasses' location stream */
export interface LocationUpdateLike {
  lat: number;
  lng: number;
  accuracy?: number | null;
  timestamp?: Date | string | number;
}

/**
 * Build a fix from a stream message, keeping its accuracy and the time it was taken.
 * Falls back to the receive time when the message carries no usable timestamp.
 */
export function toLocationFix(update: LocationUpdateLike, receivedAt: Date = new Date()): LocationFix {
  const takenAt = update.timestamp === undefined ? receivedAt : new Date(update.timestamp);

  return {
    location: { lat: update.lat, lng: update.lng },
    accuracy: update.accuracy ?? undefined,
    timestamp: Number.isNaN(takenAt.getTime()) ? receivedAt : takenAt
  };
}
