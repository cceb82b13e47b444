/**
 * Navigation Manager
 * Owns one guidance session: feeds fixes through the guidance engine and announcer,
 * publishes navigation events, requests a new route when the vehicle leaves the
 * planned one, and detects arrival.
 */

import {
  Coordinates,
  GuidanceTick,
  LocationFix,
  Maneuver,
  NavigationEvent,
  NavigationEventData,
  NavigationEventType,
  NavigationSettings
} from '../types/navigation.js';
import { GuidanceEngine } from './guidanceEngine.js';
import { Announcer } from './announcer.js';
import { RouteGeometry } from './routeGeometry.js';
import { RouteSource } from './routeService.js';
import { DEFAULT_NAVIGATION_SETTINGS } from '../config.js';
import { formatDistance, formatDuration } from '../utils/distance.js';
import { inferRoadClass } from '../utils/instructions.js';
import { logError, logInfo, logWarn } from '../utils/logger.js';

type ListenerMap = {
  [K in NavigationEventType]: Array<(event: NavigationEvent<K>) => void>;
};

export interface NavigationManagerOptions {
  /** Receives every spoken prompt (TTS or text display) */
  speak: (text: string) => void;
  settings?: Partial<NavigationSettings>;
  /** Source asked for a replacement route when the engine suggests a reroute */
  rerouteSource?: RouteSource;
}

export const ARRIVAL_ANNOUNCEMENT = 'You have arrived at your destination';
export const REROUTE_ANNOUNCEMENT = 'Off route. Recalculating';

export class NavigationManager {
  private readonly settings: NavigationSettings;
  private readonly speak: (text: string) => void;
  private readonly rerouteSource?: RouteSource;
  private readonly announcer: Announcer;
  private engine: GuidanceEngine | null = null;
  private navigating = false;
  private hasDeparted = false;
  private wasOffRoute = false;
  private rerouteRequested = false;
  private rerouteInFlight: Promise<void> | null = null;
  // bumped whenever a route is installed; reroute results for an older route are dropped
  private routeGeneration = 0;
  private lastTick: GuidanceTick | null = null;
  private locationUnsubscriber?: () => void;

  private readonly eventListeners: ListenerMap = {
    navigation_started: [],
    navigation_cancelled: [],
    guidance_tick: [],
    announcement: [],
    off_route_detected: [],
    back_on_route: [],
    reroute_requested: [],
    route_recalculated: [],
    reroute_failed: [],
    destination_reached: []
  };

  constructor(options: NavigationManagerOptions) {
    this.speak = options.speak;
    this.rerouteSource = options.rerouteSource;
    this.settings = { ...DEFAULT_NAVIGATION_SETTINGS, ...options.settings };
    this.announcer = new Announcer(
      (text) => {
        this.emitEvent('announcement', { text });
        this.speak(text);
      },
      { highwayMode: this.settings.highwayMode }
    );
  }

  /**
   * Start guiding along a route
   */
  startNavigation(route: RouteGeometry): void {
    this.engine = new GuidanceEngine(route, { ...this.settings.guidance, highwayMode: this.settings.highwayMode });
    this.announcer.reset();
    this.announcer.setHighwayMode(this.settings.highwayMode);
    this.routeGeneration += 1;
    this.navigating = true;
    this.hasDeparted = false;
    this.wasOffRoute = false;
    this.rerouteRequested = false;
    this.rerouteInFlight = null;
    this.lastTick = null;
    this.applyRoadClass(route.maneuvers[0]);

    logInfo(`🧭 Navigation started: ${route.points.length} points, ${route.maneuvers.length} maneuvers`);
    this.emitEvent('navigation_started', {
      totalDistance: route.totalDistance,
      maneuvers: route.maneuvers.length
    });

    if (!route.isDegenerate) {
      const distanceText = formatDistance(route.totalDistance, this.settings.distanceUnits);
      const timeText = formatDuration(this.estimateRemainingSeconds(route, route.totalDistance));
      this.announcer.announceNow(`Navigation started. ${distanceText}, estimated time ${timeText}.`);
    }
  }

  /**
   * Handle one location fix from the location source
   * @returns The guidance tick, or null when no navigation is active
   */
  onLocationUpdate(fix: LocationFix): GuidanceTick | null {
    if (!this.navigating || !this.engine) {
      return null;
    }

    const tick = this.engine.onLocation(fix);
    this.lastTick = tick;
    this.emitEvent('guidance_tick', { tick });

    this.trackOffRoute(tick, fix.location);

    if (tick.remainingMeters > this.settings.arrivalThresholdMeters) {
      this.hasDeparted = true;
    } else if (this.hasDeparted && !tick.isOffRoute) {
      this.handleDestinationReached(fix.location);
      return tick;
    }

    this.applyRoadClass(tick.nextManeuver);
    this.announcer.onTick(tick);

    return tick;
  }

  /**
   * Install a replacement route (after a reroute) without ending the session
   */
  acceptRoute(route: RouteGeometry): void {
    if (!this.engine) {
      this.startNavigation(route);
      return;
    }

    this.routeGeneration += 1;
    this.engine.replaceRoute(route);
    this.announcer.reset();
    this.wasOffRoute = false;
    this.rerouteRequested = false;
    this.applyRoadClass(route.maneuvers[0]);

    this.emitEvent('route_recalculated', { totalDistance: route.totalDistance });
  }

  stopNavigation(): void {
    if (!this.navigating) {
      return;
    }

    this.navigating = false;
    logInfo('🛑 Navigation stopped');
    this.emitEvent('navigation_cancelled', {});
  }

  /**
   * Stop guidance and release the location subscription
   */
  dispose(): void {
    this.stopNavigation();
    if (this.locationUnsubscriber) {
      try {
        this.locationUnsubscriber();
      } catch (error) {
        logError('Error stopping location updates:', error);
      }
      this.locationUnsubscriber = undefined;
    }
  }

  getNavigationStatus(): string {
    if (!this.navigating || !this.engine) {
      return 'Navigation is not active';
    }
    if (!this.lastTick) {
      return 'Waiting for GPS fix';
    }

    const units = this.settings.distanceUnits;
    const tick = this.lastTick;
    const remainingTime = this.estimateRemainingSeconds(this.engine.currentRoute, tick.remainingMeters);
    let status = `${formatDistance(tick.remainingMeters, units)} remaining, ETA ${formatDuration(remainingTime, true)}`;

    if (tick.nextManeuver) {
      status += `. Next: ${tick.nextManeuver.instruction} in ${formatDistance(tick.distanceToManeuver, units)}`;
    }
    if (tick.isOffRoute) {
      status += '. Off route';
    }
    return status;
  }

  setHighwayMode(isHighway: boolean): void {
    this.announcer.setHighwayMode(isHighway);
    this.engine?.setHighwayMode(isHighway);
  }

  setLocationUnsubscriber(unsubscriber: () => void): void {
    this.locationUnsubscriber = unsubscriber;
  }

  /**
   * Resolves once any in-flight reroute request has settled
   */
  whenRerouteSettled(): Promise<void> {
    return this.rerouteInFlight ?? Promise.resolve();
  }

  get isNavigating(): boolean {
    return this.navigating;
  }

  get currentTick(): GuidanceTick | null {
    return this.lastTick;
  }

  get currentRoute(): RouteGeometry | null {
    return this.engine?.currentRoute ?? null;
  }

  on<T extends NavigationEventType>(eventType: T, listener: (event: NavigationEvent<T>) => void): void {
    this.eventListeners[eventType].push(listener);
  }

  off<T extends NavigationEventType>(eventType: T, listener: (event: NavigationEvent<T>) => void): void {
    const listeners = this.eventListeners[eventType];
    const index = listeners.indexOf(listener);
    if (index > -1) {
      listeners.splice(index, 1);
    }
  }

  private trackOffRoute(tick: GuidanceTick, location: Coordinates): void {
    if (tick.isOffRoute && !this.wasOffRoute) {
      this.emitEvent('off_route_detected', { location, distanceFromRoute: tick.distanceFromRoute });
    } else if (!tick.isOffRoute && this.wasOffRoute) {
      logInfo('✅ Back on route');
      this.rerouteRequested = false;
      this.emitEvent('back_on_route', { location });
    }
    this.wasOffRoute = tick.isOffRoute;

    if (!tick.shouldReroute) return;

    // prompt once per off-route episode; failed fetches retry silently on later fixes
    if (!this.rerouteRequested) {
      this.rerouteRequested = true;
      logWarn(`🚨 Reroute suggested at ${location.lat.toFixed(6)}, ${location.lng.toFixed(6)}`);
      this.emitEvent('reroute_requested', { location });
      this.announcer.announceNow(REROUTE_ANNOUNCEMENT);
    }
    this.requestReroute(location);
  }

  private requestReroute(origin: Coordinates): void {
    const destination = this.engine?.currentRoute.destination;
    if (!this.rerouteSource || !destination || this.rerouteInFlight) {
      return;
    }

    const source = this.rerouteSource;
    const generation = this.routeGeneration;
    const isCurrent = () => this.navigating && generation === this.routeGeneration;

    const request: Promise<void> = source
      .fetchRoute({ origin, destination })
      .then((route) => {
        if (!isCurrent()) {
          logInfo('🗑️ Dropping reroute for a route that is no longer active');
          return;
        }
        logInfo(`🗺️ Reroute received from ${source.description}`);
        this.acceptRoute(route);
      })
      .catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        logError('Error recalculating route:', failure);
        if (isCurrent()) {
          this.emitEvent('reroute_failed', { error: failure });
        }
      })
      .finally(() => {
        if (this.rerouteInFlight === request) {
          this.rerouteInFlight = null;
        }
      });
    this.rerouteInFlight = request;
  }

  private handleDestinationReached(location: Coordinates): void {
    this.navigating = false;
    logInfo('🎯 Destination reached');
    this.announcer.announceNow(ARRIVAL_ANNOUNCEMENT);
    this.emitEvent('destination_reached', { location });
  }

  private applyRoadClass(maneuver: Maneuver | undefined): void {
    if (!this.settings.autoRoadClass || !maneuver) return;
    this.setHighwayMode(inferRoadClass(maneuver) === 'highway');
  }

  /**
   * Remaining time at the route's own pace when maneuvers carry durations,
   * otherwise at the configured average speed
   */
  private estimateRemainingSeconds(route: RouteGeometry, remainingMeters: number): number {
    const routeSeconds = route.maneuvers.reduce((sum, maneuver) => sum + (maneuver.durationSeconds ?? 0), 0);
    if (routeSeconds > 0 && route.totalDistance > 0) {
      return remainingMeters * (routeSeconds / route.totalDistance);
    }
    return remainingMeters / this.settings.averageSpeedMps;
  }

  private emitEvent<T extends NavigationEventType>(type: T, data: NavigationEventData[T]): void {
    const event: NavigationEvent<T> = {
      type,
      timestamp: new Date(),
      data
    };

    this.eventListeners[type].forEach((listener) => listener(event));
  }
}
