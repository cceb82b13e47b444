/**
 * Guidance Engine
 * Matches each location fix against the planned route, tracks progress along it,
 * and decides when the vehicle is off route and when a reroute is warranted.
 *
 * States: on-route-tracking -> off-route-suspected -> reroute-requested.
 * Any fix back within the off-route threshold returns to on-route-tracking.
 */

import {
  Coordinates,
  GuidanceOptions,
  GuidanceState,
  GuidanceTick,
  LocationFix
} from '../types/navigation.js';
import { RouteGeometry } from './routeGeometry.js';
import { coordinatesToString } from '../utils/distance.js';
import { logDebug, logInfo, logWarn } from '../utils/logger.js';

export const DEFAULT_GUIDANCE_OPTIONS: Required<GuidanceOptions> = {
  offRouteThresholdMeters: 35,
  highwayOffRouteThresholdMeters: 90,
  rerouteMinConsecutiveFixes: 3,
  rerouteMinDurationMs: 0,
  backwardToleranceIndices: 5,
  backwardCorrectionFactor: 3,
  lowConfidenceAccuracyMeters: 50,
  holdProgressOnLowConfidence: false,
  highwayMode: false
};

interface RouteMatch {
  index: number;
  distanceMeters: number;
  isBackwardCorrection: boolean;
}

export function resolveGuidanceOptions(options: GuidanceOptions = {}): Required<GuidanceOptions> {
  const defaults = DEFAULT_GUIDANCE_OPTIONS;
  return {
    offRouteThresholdMeters: options.offRouteThresholdMeters ?? defaults.offRouteThresholdMeters,
    highwayOffRouteThresholdMeters: options.highwayOffRouteThresholdMeters ?? defaults.highwayOffRouteThresholdMeters,
    rerouteMinConsecutiveFixes: options.rerouteMinConsecutiveFixes ?? defaults.rerouteMinConsecutiveFixes,
    rerouteMinDurationMs: options.rerouteMinDurationMs ?? defaults.rerouteMinDurationMs,
    backwardToleranceIndices: options.backwardToleranceIndices ?? defaults.backwardToleranceIndices,
    backwardCorrectionFactor: options.backwardCorrectionFactor ?? defaults.backwardCorrectionFactor,
    lowConfidenceAccuracyMeters: options.lowConfidenceAccuracyMeters ?? defaults.lowConfidenceAccuracyMeters,
    holdProgressOnLowConfidence: options.holdProgressOnLowConfidence ?? defaults.holdProgressOnLowConfidence,
    highwayMode: options.highwayMode ?? defaults.highwayMode
  };
}

export class GuidanceEngine {
  private route: RouteGeometry;
  private readonly settings: Required<GuidanceOptions>;
  private highwayMode: boolean;
  private lastMatchedIndex = 0;
  private strikes = 0;
  private offRouteSince: number | null = null;
  private guidanceState: GuidanceState = 'on-route-tracking';

  constructor(route: RouteGeometry, options: GuidanceOptions = {}) {
    this.route = route;
    this.settings = resolveGuidanceOptions(options);
    this.highwayMode = this.settings.highwayMode;
  }

  /**
   * Process one fix. Must be called in fix-arrival order.
   */
  onLocation(fix: LocationFix): GuidanceTick {
    // Read the route once so a tick never mixes two routes
    const route = this.route;
    const timestampMs = fix.timestamp.getTime();
    const isLowConfidence =
      fix.accuracy !== undefined && fix.accuracy > this.settings.lowConfidenceAccuracyMeters;

    if (route.isDegenerate) {
      return this.degenerateTick(route, fix, isLowConfidence);
    }

    const match = this.matchLocation(route, fix.location);
    const offRouteThreshold = this.offRouteThreshold;
    const isOffRoute = match.distanceMeters > offRouteThreshold;

    if (isOffRoute) {
      this.strikes += 1;
      if (this.offRouteSince === null) {
        this.offRouteSince = timestampMs;
      }
      logWarn(`⚠️ Off-route strike #${this.strikes}: ${match.distanceMeters.toFixed(1)}m from route (threshold ${offRouteThreshold}m)`);
    } else {
      this.strikes = 0;
      this.offRouteSince = null;
    }

    const minFixes = Math.max(1, this.settings.rerouteMinConsecutiveFixes);
    const minDurationMs = this.settings.rerouteMinDurationMs;
    const persistedLongEnough =
      minDurationMs > 0 && this.offRouteSince !== null && timestampMs - this.offRouteSince >= minDurationMs;
    const shouldReroute = isOffRoute && (this.strikes >= minFixes || persistedLongEnough);

    const holdForConfidence = isLowConfidence && this.settings.holdProgressOnLowConfidence;
    if (!isOffRoute && !holdForConfidence) {
      if (match.index > this.lastMatchedIndex || match.isBackwardCorrection) {
        this.lastMatchedIndex = match.index;
      }
    }

    const nextState: GuidanceState = shouldReroute
      ? 'reroute-requested'
      : isOffRoute
        ? 'off-route-suspected'
        : 'on-route-tracking';
    if (nextState !== this.guidanceState) {
      logInfo(`🧭 Guidance state ${this.guidanceState} -> ${nextState}`);
      this.guidanceState = nextState;
    }

    const progressIndex = this.lastMatchedIndex;
    const nextManeuver = route.nextManeuver(progressIndex);
    const tick: GuidanceTick = {
      snappedPoint: route.pointAt(match.index) ?? fix.location,
      matchedIndex: progressIndex,
      remainingMeters: route.remainingDistance(progressIndex),
      nextManeuver,
      distanceToManeuver: route.distanceToNextManeuver(progressIndex),
      distanceFromRoute: match.distanceMeters,
      isOffRoute,
      shouldReroute,
      isLowConfidence,
      state: this.guidanceState,
      timestamp: fix.timestamp
    };

    logDebug(`📍 ${coordinatesToString(fix.location)} -> index ${progressIndex}, ${tick.remainingMeters.toFixed(0)}m remaining`, {
      nextManeuver: nextManeuver?.instruction,
      distanceToManeuver: tick.distanceToManeuver
    });

    return tick;
  }

  /**
   * Install a freshly computed route and start tracking it from the beginning
   */
  replaceRoute(route: RouteGeometry): void {
    this.route = route;
    this.lastMatchedIndex = 0;
    this.resetOffRouteState();
    logInfo(`🔄 Route replaced: ${route.points.length} points, ${route.maneuvers.length} maneuvers, ${route.totalDistance.toFixed(0)}m`);
  }

  resetOffRouteState(): void {
    this.strikes = 0;
    this.offRouteSince = null;
    this.guidanceState = 'on-route-tracking';
  }

  setHighwayMode(isHighway: boolean): void {
    this.highwayMode = isHighway;
  }

  get isHighwayMode(): boolean {
    return this.highwayMode;
  }

  get currentRoute(): RouteGeometry {
    return this.route;
  }

  get matchedIndex(): number {
    return this.lastMatchedIndex;
  }

  get offRouteStrikes(): number {
    return this.strikes;
  }

  get state(): GuidanceState {
    return this.guidanceState;
  }

  get offRouteThreshold(): number {
    return this.highwayMode
      ? this.settings.highwayOffRouteThresholdMeters
      : this.settings.offRouteThresholdMeters;
  }

  /**
   * Search from just behind the last match forward, so short GPS jitter loops
   * cannot drag progress backward. Points before the window win only when they
   * are backwardCorrectionFactor times closer.
   */
  private matchLocation(route: RouteGeometry, location: Coordinates): RouteMatch {
    const windowStart = Math.max(0, this.lastMatchedIndex - Math.max(0, this.settings.backwardToleranceIndices));
    const ahead = route.nearestInRange(location, windowStart, route.lastIndex);
    if (!ahead) {
      return { index: 0, distanceMeters: 0, isBackwardCorrection: false };
    }

    if (windowStart > 0) {
      const behind = route.nearestInRange(location, 0, windowStart - 1);
      if (behind && behind.distanceMeters * this.settings.backwardCorrectionFactor < ahead.distanceMeters) {
        logInfo(`↩️ Backward correction: index ${this.lastMatchedIndex} -> ${behind.index}`);
        return { ...behind, isBackwardCorrection: true };
      }
    }

    return { ...ahead, isBackwardCorrection: false };
  }

  private degenerateTick(route: RouteGeometry, fix: LocationFix, isLowConfidence: boolean): GuidanceTick {
    return {
      snappedPoint: route.pointAt(0) ?? fix.location,
      matchedIndex: 0,
      remainingMeters: 0,
      nextManeuver: undefined,
      distanceToManeuver: 0,
      distanceFromRoute: 0,
      isOffRoute: false,
      shouldReroute: false,
      isLowConfidence,
      state: 'on-route-tracking',
      timestamp: fix.timestamp
    };
  }
}
