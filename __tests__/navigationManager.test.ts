import { NavigationManager, REROUTE_ANNOUNCEMENT } from '../src/services/navigationManager';
import { RouteGeometry } from '../src/services/routeGeometry';
import { RouteSource } from '../src/services/routeService';
import { NavigationEventType } from '../src/types/navigation';
import { fixNear, maneuverAt, straightRoute } from './helpers/routes';

const EVENT_TYPES: NavigationEventType[] = [
  'navigation_started',
  'navigation_cancelled',
  'guidance_tick',
  'announcement',
  'off_route_detected',
  'back_on_route',
  'reroute_requested',
  'route_recalculated',
  'reroute_failed',
  'destination_reached'
];

const buildRoute = () =>
  straightRoute(11, 100, [maneuverAt(5), maneuverAt(10, 'arrive', 'You have arrived')]);

const recordEvents = (manager: NavigationManager): NavigationEventType[] => {
  const seen: NavigationEventType[] = [];
  EVENT_TYPES.filter((type) => type !== 'guidance_tick').forEach((type) =>
    manager.on(type, (event) => seen.push(event.type))
  );
  return seen;
};

const fakeSource = (fetchRoute: RouteSource['fetchRoute']): RouteSource => ({
  description: 'fake route service',
  fetchRoute
});

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });
  return { promise, resolve, reject };
};

describe('NavigationManager', () => {
  test('ignores fixes until navigation starts', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    expect(manager.onLocationUpdate(fixNear(1))).toBeNull();
    expect(manager.isNavigating).toBe(false);
    expect(manager.getNavigationStatus()).toBe('Navigation is not active');
  });

  test('guides along the route and announces arrival', () => {
    const speak = jest.fn();
    const manager = new NavigationManager({ speak, settings: { averageSpeedMps: 2 } });
    const events = recordEvents(manager);

    manager.startNavigation(buildRoute());
    [1, 3, 4, 5, 8, 10].forEach((index) => manager.onLocationUpdate(fixNear(index)));

    expect(speak.mock.calls.map(([text]) => text)).toEqual([
      'Navigation started. 1.0 km, estimated time 8 minutes.',
      'In 200 meters, turn right onto Dock Road',
      'turn right onto Dock Road',
      'In 200 meters, you have arrived at your destination',
      'You have arrived at your destination'
    ]);
    expect(events).toEqual([
      'navigation_started',
      'announcement',
      'announcement',
      'announcement',
      'announcement',
      'announcement',
      'destination_reached'
    ]);
    expect(manager.isNavigating).toBe(false);
    expect(manager.onLocationUpdate(fixNear(10))).toBeNull();
  });

  test('does not report arrival before leaving the destination radius', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    const events = recordEvents(manager);
    manager.startNavigation(buildRoute());

    const tick = manager.onLocationUpdate(fixNear(10));
    expect(tick?.remainingMeters).toBe(0);
    expect(manager.isNavigating).toBe(true);
    expect(events).not.toContain('destination_reached');
  });

  test('publishes every tick', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    const ticks: number[] = [];
    manager.on('guidance_tick', (event) => ticks.push(event.data.tick.matchedIndex));
    manager.startNavigation(buildRoute());

    manager.onLocationUpdate(fixNear(2));
    manager.onLocationUpdate(fixNear(3));

    expect(ticks).toEqual([2, 3]);
    expect(manager.currentTick?.matchedIndex).toBe(3);
  });

  test('reports status with remaining distance, ETA and next maneuver', () => {
    const manager = new NavigationManager({ speak: jest.fn(), settings: { averageSpeedMps: 2 } });
    manager.startNavigation(buildRoute());
    expect(manager.getNavigationStatus()).toBe('Waiting for GPS fix');

    manager.onLocationUpdate(fixNear(3));
    expect(manager.getNavigationStatus()).toBe('700 m remaining, ETA 5m. Next: Turn right onto Dock Road in 200 m');
  });

  test('reports status in imperial units when configured', () => {
    const manager = new NavigationManager({
      speak: jest.fn(),
      settings: { averageSpeedMps: 2, distanceUnits: 'imperial' }
    });
    manager.startNavigation(buildRoute());

    manager.onLocationUpdate(fixNear(3));
    expect(manager.getNavigationStatus()).toBe('0.4 mi remaining, ETA 5m. Next: Turn right onto Dock Road in 0.1 mi');
  });

  test('requests one reroute per off-route episode and installs the new route', async () => {
    const replacement = straightRoute(4, 100);
    const fetchRoute = jest.fn().mockResolvedValue(replacement);
    const speak = jest.fn();
    const manager = new NavigationManager({
      speak,
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 2 } },
      rerouteSource: fakeSource(fetchRoute)
    });
    const events = recordEvents(manager);
    const offRouteDistances: number[] = [];
    manager.on('off_route_detected', (event) => offRouteDistances.push(event.data.distanceFromRoute));
    manager.startNavigation(buildRoute());

    manager.onLocationUpdate(fixNear(2));
    manager.onLocationUpdate(fixNear(3, 200));
    const offFix = fixNear(3, 200);
    manager.onLocationUpdate(offFix);
    manager.onLocationUpdate(fixNear(3, 200));

    expect(fetchRoute).toHaveBeenCalledTimes(1);
    expect(fetchRoute).toHaveBeenCalledWith({ origin: offFix.location, destination: { lat: 0, lng: 0.01 } });
    expect(speak).toHaveBeenCalledWith(REROUTE_ANNOUNCEMENT);
    expect(offRouteDistances).toHaveLength(1);
    expect(offRouteDistances[0]).toBeCloseTo(200, 3);

    await manager.whenRerouteSettled();

    expect(manager.currentRoute).toBe(replacement);
    expect(events.filter((type) => type === 'reroute_requested')).toHaveLength(1);
    expect(events[events.length - 1]).toBe('route_recalculated');

    const tick = manager.onLocationUpdate(fixNear(1));
    expect(tick?.matchedIndex).toBe(1);
    expect(tick?.remainingMeters).toBe(200);
  });

  test('a failed reroute is reported and retried on the next suggestion', async () => {
    const fetchRoute = jest.fn().mockRejectedValue(new Error('service down'));
    const manager = new NavigationManager({
      speak: jest.fn(),
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 1 } },
      rerouteSource: fakeSource(fetchRoute)
    });
    const failures: string[] = [];
    manager.on('reroute_failed', (event) => failures.push(event.data.error.message));
    manager.startNavigation(buildRoute());

    manager.onLocationUpdate(fixNear(3, 200));
    await manager.whenRerouteSettled();
    expect(failures).toEqual(['service down']);
    expect(manager.isNavigating).toBe(true);

    manager.onLocationUpdate(fixNear(3, 200));
    await manager.whenRerouteSettled();
    expect(fetchRoute).toHaveBeenCalledTimes(2);
    expect(failures).toEqual(['service down', 'service down']);
  });

  test('retrying after a failed reroute does not repeat the off-route prompt', async () => {
    const fetchRoute = jest.fn().mockRejectedValue(new Error('service down'));
    const speak = jest.fn();
    const manager = new NavigationManager({
      speak,
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 1 } },
      rerouteSource: fakeSource(fetchRoute)
    });
    const events = recordEvents(manager);
    manager.startNavigation(buildRoute());

    for (let attempt = 0; attempt < 3; attempt += 1) {
      manager.onLocationUpdate(fixNear(3, 200));
      await manager.whenRerouteSettled();
    }

    expect(fetchRoute).toHaveBeenCalledTimes(3);
    expect(events.filter((type) => type === 'reroute_requested')).toHaveLength(1);
    expect(events.filter((type) => type === 'reroute_failed')).toHaveLength(3);
    expect(speak.mock.calls.filter(([text]) => text === REROUTE_ANNOUNCEMENT)).toHaveLength(1);

    // a new off-route episode prompts again
    manager.onLocationUpdate(fixNear(3));
    manager.onLocationUpdate(fixNear(3, 200));
    await manager.whenRerouteSettled();
    expect(events.filter((type) => type === 'reroute_requested')).toHaveLength(2);
    expect(speak.mock.calls.filter(([text]) => text === REROUTE_ANNOUNCEMENT)).toHaveLength(2);
  });

  test('a reroute for a cancelled trip does not replace the next trip', async () => {
    const staleFetch = deferred<RouteGeometry>();
    const currentFetch = deferred<RouteGeometry>();
    const fetchRoute = jest.fn().mockReturnValueOnce(staleFetch.promise).mockReturnValueOnce(currentFetch.promise);
    const manager = new NavigationManager({
      speak: jest.fn(),
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 1 } },
      rerouteSource: fakeSource(fetchRoute)
    });
    const events = recordEvents(manager);

    manager.startNavigation(buildRoute());
    manager.onLocationUpdate(fixNear(3, 200));
    const staleRequest = manager.whenRerouteSettled();

    const nextTrip = straightRoute(6, 100);
    manager.stopNavigation();
    manager.startNavigation(nextTrip);
    manager.onLocationUpdate(fixNear(3, 200));

    expect(fetchRoute).toHaveBeenCalledTimes(2);
    expect(fetchRoute).toHaveBeenLastCalledWith({
      origin: fixNear(3, 200).location,
      destination: { lat: 0, lng: 0.005 }
    });

    staleFetch.resolve(straightRoute(3, 100));
    await staleRequest;
    expect(manager.currentRoute).toBe(nextTrip);
    expect(events).not.toContain('route_recalculated');

    const nextReplacement = straightRoute(4, 100);
    currentFetch.resolve(nextReplacement);
    await manager.whenRerouteSettled();
    expect(manager.currentRoute).toBe(nextReplacement);
    expect(events.filter((type) => type === 'route_recalculated')).toHaveLength(1);
  });

  test('a reroute failing after the trip is cancelled is not reported', async () => {
    const pending = deferred<RouteGeometry>();
    const manager = new NavigationManager({
      speak: jest.fn(),
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 1 } },
      rerouteSource: fakeSource(jest.fn().mockReturnValue(pending.promise))
    });
    const failures = jest.fn();
    manager.on('reroute_failed', failures);

    manager.startNavigation(buildRoute());
    manager.onLocationUpdate(fixNear(3, 200));
    const request = manager.whenRerouteSettled();
    manager.stopNavigation();

    pending.reject(new Error('service down'));
    await request;
    expect(failures).not.toHaveBeenCalled();
  });

  test('returning to the route ends the off-route episode', () => {
    const manager = new NavigationManager({
      speak: jest.fn(),
      settings: { guidance: { offRouteThresholdMeters: 80, rerouteMinConsecutiveFixes: 1 } }
    });
    const events = recordEvents(manager);
    manager.startNavigation(buildRoute());

    manager.onLocationUpdate(fixNear(3, 200));
    manager.onLocationUpdate(fixNear(3, 200));
    manager.onLocationUpdate(fixNear(3));
    manager.onLocationUpdate(fixNear(4, 200));

    expect(events.filter((type) => type !== 'announcement')).toEqual([
      'navigation_started',
      'off_route_detected',
      'reroute_requested',
      'back_on_route',
      'off_route_detected',
      'reroute_requested'
    ]);
  });

  test('merge and exit maneuvers switch to highway thresholds', () => {
    const route = straightRoute(11, 100, [maneuverAt(5, 'merge', 'Merge onto I-80')]);

    const auto = new NavigationManager({ speak: jest.fn() });
    auto.startNavigation(route);
    expect(auto.onLocationUpdate(fixNear(2, 60))?.isOffRoute).toBe(false);

    const fixed = new NavigationManager({ speak: jest.fn(), settings: { autoRoadClass: false } });
    fixed.startNavigation(route);
    expect(fixed.onLocationUpdate(fixNear(2, 60))?.isOffRoute).toBe(true);
  });

  test('stopNavigation cancels once', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    const events = recordEvents(manager);
    manager.startNavigation(buildRoute());

    manager.stopNavigation();
    manager.stopNavigation();

    expect(events.filter((type) => type === 'navigation_cancelled')).toHaveLength(1);
    expect(manager.onLocationUpdate(fixNear(2))).toBeNull();
  });

  test('dispose releases the location subscription', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    const unsubscribe = jest.fn();
    manager.setLocationUnsubscriber(unsubscribe);
    manager.startNavigation(buildRoute());

    manager.dispose();
    manager.dispose();

    expect(unsubscribe).toHaveBeenCalledTimes(1);
    expect(manager.isNavigating).toBe(false);
  });

  test('off removes a listener', () => {
    const manager = new NavigationManager({ speak: jest.fn() });
    const listener = jest.fn();
    manager.on('navigation_started', listener);
    manager.off('navigation_started', listener);

    manager.startNavigation(buildRoute());
    expect(listener).not.toHaveBeenCalled();
  });
});
