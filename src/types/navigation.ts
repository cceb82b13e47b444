/**
 * Guidance Type Definitions
 * Shared types for route geometry, location fixes, guidance ticks and navigation events
 */

export interface Coordinates {
  lat: number;
  lng: number;
}

/**
 * A single GPS reading from the location source
 */
export interface LocationFix {
  location: Coordinates;
  accuracy?: number; // meters, horizontal
  timestamp: Date;
}

export type ManeuverKind =
  | 'turn-left'
  | 'turn-right'
  | 'merge'
  | 'exit'
  | 'keep-left'
  | 'keep-right'
  | 'u-turn'
  | 'arrive'
  | 'continue'
  | 'other';

export const MANEUVER_KINDS: readonly ManeuverKind[] = [
  'turn-left',
  'turn-right',
  'merge',
  'exit',
  'keep-left',
  'keep-right',
  'u-turn',
  'arrive',
  'continue',
  'other'
];

export interface Maneuver {
  pointIndex: number; // index into the route points where the maneuver happens
  kind: ManeuverKind;
  instruction: string;
  exitNumber?: string;
  bearingBefore: number;
  bearingAfter: number;
  distanceMeters: number; // distance to travel after the maneuver
  durationSeconds?: number;
  roadName?: string;
}

export type RoadClass = 'highway' | 'city';

export type GuidanceState = 'on-route-tracking' | 'off-route-suspected' | 'reroute-requested';

/**
 * Result of matching one fix against the route
 */
export interface GuidanceTick {
  readonly snappedPoint: Coordinates;
  readonly matchedIndex: number;
  readonly remainingMeters: number;
  readonly nextManeuver?: Maneuver;
  readonly distanceToManeuver: number;
  readonly distanceFromRoute: number;
  readonly isOffRoute: boolean;
  readonly shouldReroute: boolean;
  readonly isLowConfidence: boolean;
  readonly state: GuidanceState;
  readonly timestamp: Date;
}

export interface GuidanceOptions {
  offRouteThresholdMeters?: number;
  highwayOffRouteThresholdMeters?: number;
  rerouteMinConsecutiveFixes?: number;
  rerouteMinDurationMs?: number; // 0 disables the duration rule
  backwardToleranceIndices?: number;
  backwardCorrectionFactor?: number;
  lowConfidenceAccuracyMeters?: number;
  holdProgressOnLowConfidence?: boolean;
  highwayMode?: boolean;
}

export interface NavigationSettings {
  guidance: GuidanceOptions;
  highwayMode: boolean;
  autoRoadClass: boolean; // derive highway/city from the upcoming maneuver
  arrivalThresholdMeters: number;
  distanceUnits: DistanceUnits;
  averageSpeedMps: number; // used for ETA when maneuvers carry no durations
}

export type DistanceUnits = 'metric' | 'imperial';

export interface RouteRequest {
  origin: Coordinates;
  destination: Coordinates;
}

export type NavigationEventType =
  | 'navigation_started'
  | 'navigation_cancelled'
  | 'guidance_tick'
  | 'announcement'
  | 'off_route_detected'
  | 'back_on_route'
  | 'reroute_requested'
  | 'route_recalculated'
  | 'reroute_failed'
  | 'destination_reached';

export interface NavigationEventData {
  navigation_started: { totalDistance: number; maneuvers: number };
  navigation_cancelled: Record<string, never>;
  guidance_tick: { tick: GuidanceTick };
  announcement: { text: string };
  off_route_detected: { location: Coordinates; distanceFromRoute: number };
  back_on_route: { location: Coordinates };
  reroute_requested: { location: Coordinates };
  route_recalculated: { totalDistance: number };
  reroute_failed: { error: Error };
  destination_reached: { location: Coordinates };
}

export interface NavigationEvent<T extends NavigationEventType = NavigationEventType> {
  type: T;
  timestamp: Date;
  data: NavigationEventData[T];
}
