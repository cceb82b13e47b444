/**
 * Distance and Location Utility Functions
 * Spherical distance math plus display formatting for distances and durations
 */

import { Coordinates, DistanceUnits } from '../types/navigation.js';

export const EARTH_RADIUS_METERS = 6371000;

/**
 * Calculate the distance between two coordinates using the Haversine formula
 * @returns Distance in meters
 */
export function calculateDistance(point1: Coordinates, point2: Coordinates): number {
  const φ1 = degreesToRadians(point1.lat);
  const φ2 = degreesToRadians(point2.lat);
  const Δφ = degreesToRadians(point2.lat - point1.lat);
  const Δλ = degreesToRadians(point2.lng - point1.lng);

  const a = Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) *
    Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Format distance for display based on user's preferred units
 * @param precision Number of decimal places for km / mi (default: 1)
 */
export function formatDistance(meters: number, units: DistanceUnits, precision: number = 1): string {
  if (units === 'imperial') {
    const feet = meters * 3.28084;
    const miles = feet / 5280;

    if (miles >= 0.1) {
      return `${miles.toFixed(precision)} mi`;
    }
    return `${Math.round(feet)} ft`;
  }

  const kilometers = meters / 1000;
  if (kilometers >= 1) {
    return `${kilometers.toFixed(precision)} km`;
  }
  return `${Math.round(meters)} m`;
}

/**
 * Format duration for display
 * @param short Whether to use short format (5m vs 5 minutes)
 */
export function formatDuration(seconds: number, short: boolean = false): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (short) {
    return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
  }

  const minuteText = minutes === 1 ? 'minute' : 'minutes';
  if (hours > 0) {
    const hourText = hours === 1 ? 'hour' : 'hours';
    return `${hours} ${hourText}${minutes > 0 ? ` ${minutes} ${minuteText}` : ''}`;
  }
  return `${minutes} ${minuteText}`;
}

export function coordinatesToString(coordinates: Coordinates, precision: number = 6): string {
  return `${coordinates.lat.toFixed(precision)},${coordinates.lng.toFixed(precision)}`;
}

/**
 * Check if coordinates are valid WGS84 degrees
 */
export function validateCoordinates(coordinates: Coordinates): boolean {
  return (
    typeof coordinates.lat === 'number' &&
    typeof coordinates.lng === 'number' &&
    !Number.isNaN(coordinates.lat) &&
    !Number.isNaN(coordinates.lng) &&
    coordinates.lat >= -90 &&
    coordinates.lat <= 90 &&
    coordinates.lng >= -180 &&
    coordinates.lng <= 180
  );
}

export function degreesToRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}
