/**
 * Truck Guidance Glasses App
 * MentraOS app server that runs route guidance for truck drivers on smart glasses
 */

import 'dotenv/config';
import { AppServer, AppSession, ToolCall } from '@mentra/sdk';
import { NavigationManager } from './services/navigationManager.js';
import { FileRouteSource, HttpRouteSource, RouteSource } from './services/routeService.js';
import { AppConfig, loadAppConfig } from './config.js';
import { Coordinates } from './types/navigation.js';
import { validateCoordinates } from './utils/distance.js';
import { toLocationFix } from './utils/location.js';
import { logError, logInfo, logWarn, setLogLevel } from './utils/logger.js';

/**
 * Provides turn-by-turn truck guidance with spoken prompts shown on the glasses
 */
class NavigationApp extends AppServer {
  private readonly config: AppConfig;
  private readonly routeFileSource?: FileRouteSource;
  private readonly routeServiceSource?: HttpRouteSource;
  private userNavigationManagers = new Map<string, NavigationManager>();
  private userSessions = new Map<string, AppSession>();

  constructor(config: AppConfig) {
    super({
      packageName: config.packageName,
      apiKey: config.apiKey,
      port: config.port
    });

    this.config = config;
    if (config.routeFile) {
      this.routeFileSource = new FileRouteSource(config.routeFile);
    }
    if (config.routeServiceUrl) {
      this.routeServiceSource = new HttpRouteSource({
        baseUrl: config.routeServiceUrl,
        apiKey: config.routeServiceApiKey
      });
    }
    logInfo('🧭 Truck guidance app initialized');
  }

  /**
   * Handle tool calls from voice commands
   */
  protected async onToolCall(toolCall: ToolCall): Promise<string | undefined> {
    const { toolId, toolParameters, userId } = toolCall;
    logInfo('🎙️ Tool call received:', { toolId, toolParameters, userId });

    const session = this.userSessions.get(userId);
    const navigationManager = this.userNavigationManagers.get(userId);

    if (!session || !navigationManager) {
      return 'Navigation app is not active. Please start the app first.';
    }

    try {
      switch (toolId) {
        case 'start_navigation':
          return await this.handleStartNavigation(
            session,
            navigationManager,
            toolParameters?.destination_lat,
            toolParameters?.destination_lng
          );

        case 'cancel_navigation':
          navigationManager.stopNavigation();
          return 'Navigation cancelled.';

        case 'navigation_status':
          return navigationManager.getNavigationStatus();

        default:
          return `Unknown navigation command: ${toolId}`;
      }
    } catch (error) {
      logError(`Error handling tool call ${toolId}:`, error);
      return 'An error occurred while processing your request. Please try again.';
    }
  }

  /**
   * Handle new user sessions
   */
  protected async onSession(session: AppSession, sessionId: string, userId: string): Promise<void> {
    logInfo('🚀 Guidance session started:', { userId, sessionId, totalSessions: this.userSessions.size + 1 });

    this.userSessions.set(userId, session);

    const navigationManager = new NavigationManager({
      speak: (text) => session.layouts.showTextWall(text, { durationMs: 6000 }),
      settings: this.config.navigation,
      rerouteSource: this.routeServiceSource
    });
    this.userNavigationManagers.set(userId, navigationManager);

    this.setupEventHandlers(session, navigationManager, userId);
    this.setupLocationTracking(session, navigationManager, userId);

    if (this.routeFileSource) {
      await this.startFromSource(session, navigationManager, this.routeFileSource);
    } else {
      session.layouts.showTextWall('🧭 Guidance ready\n\nSay "start navigation" with a destination.', {
        durationMs: 8000
      });
    }

    this.addCleanupHandler(() => this.userSessions.delete(userId));
  }

  /**
   * Handle cleanup when session ends
   */
  protected async onStop(sessionId: string, userId: string, reason: string): Promise<void> {
    logInfo(`🛑 Guidance session ${sessionId} stopped for user ${userId}: ${reason}`);

    this.userNavigationManagers.get(userId)?.dispose();
    this.userSessions.delete(userId);
    this.userNavigationManagers.delete(userId);
  }

  private async handleStartNavigation(
    session: AppSession,
    navigationManager: NavigationManager,
    rawLat: unknown,
    rawLng: unknown
  ): Promise<string> {
    if (!this.routeServiceSource) {
      if (!this.routeFileSource) {
        return 'No route source is configured.';
      }
      const started = await this.startFromSource(session, navigationManager, this.routeFileSource);
      return started ? 'Navigation restarted on the planned route.' : 'Unable to load the planned route.';
    }

    const destination: Coordinates = { lat: Number(rawLat), lng: Number(rawLng) };
    if (!validateCoordinates(destination)) {
      return 'Please give the destination as latitude and longitude.';
    }

    let origin: Coordinates;
    try {
      const location = await session.location.getLatestLocation({ accuracy: 'high' });
      origin = { lat: location.lat, lng: location.lng };
    } catch (error) {
      logError('Failed to get current location:', error);
      return 'Unable to get current location. Please ensure location services are enabled and try again.';
    }

    const started = await this.startFromSource(session, navigationManager, this.routeServiceSource, {
      origin,
      destination
    });
    return started ? 'Navigation started. Follow the prompts on your display.' : 'Unable to calculate a route.';
  }

  private async startFromSource(
    session: AppSession,
    navigationManager: NavigationManager,
    source: RouteSource,
    request?: { origin: Coordinates; destination: Coordinates }
  ): Promise<boolean> {
    try {
      const route = await source.fetchRoute(request);
      navigationManager.startNavigation(route);
      return true;
    } catch (error) {
      logError(`❌ Failed to load route from ${source.description}:`, error);
      session.layouts.showTextWall('⚠️ Route unavailable\n\nCheck the route source and try again.', {
        durationMs: 8000
      });
      return false;
    }
  }

  private setupEventHandlers(session: AppSession, navigationManager: NavigationManager, userId: string): void {
    navigationManager.on('navigation_started', (event) => {
      logInfo(`Navigation started for user ${userId}:`, event.data);
    });

    navigationManager.on('off_route_detected', (event) => {
      logWarn(`Off route for user ${userId}: ${event.data.distanceFromRoute.toFixed(0)}m from route`);
    });

    navigationManager.on('reroute_failed', (event) => {
      logWarn(`Reroute failed for user ${userId}: ${event.data.error.message}`);
      session.layouts.showTextWall('⚠️ Unable to recalculate route', { durationMs: 5000 });
    });

    navigationManager.on('destination_reached', () => {
      logInfo(`Destination reached for user ${userId}`);
    });
  }

  private setupLocationTracking(session: AppSession, navigationManager: NavigationManager, userId: string): void {
    logInfo(`🔧 Setting up location tracking for user ${userId}`);

    try {
      const stopLocationUpdates = session.location.subscribeToStream({ accuracy: 'high' }, (data) => {
        navigationManager.onLocationUpdate(toLocationFix(data));
      });
      navigationManager.setLocationUnsubscriber(stopLocationUpdates);
      logInfo(`✅ Location tracking active for user ${userId}`);
    } catch (error) {
      logError('❌ Location access failed:', error);
      session.layouts.showTextWall(
        '⚠️ Location Not Available\n\nPlease check device settings and try restarting the app.',
        { durationMs: 8000 }
      );
    }
  }
}

const config = loadAppConfig();
if (config.logLevel) {
  setLogLevel(config.logLevel);
}

const app = new NavigationApp(config);

app.start().then(() => {
  logInfo(`🧭 Truck guidance app running on port ${config.port}`);
}).catch((error: unknown) => {
  logError('❌ Failed to start truck guidance app:', error);
  process.exit(1);
});
