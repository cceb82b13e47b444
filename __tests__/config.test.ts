import { DEFAULT_NAVIGATION_SETTINGS, loadAppConfig, loadGuidanceOptions } from '../src/config';

const baseEnv = {
  PACKAGE_NAME: 'com.example.test',
  MENTRAOS_API_KEY: 'test-secret'
};

describe('loadAppConfig', () => {
  test('applies defaults', () => {
    const config = loadAppConfig(baseEnv);

    expect(config.packageName).toBe('com.example.test');
    expect(config.apiKey).toBe('test-secret');
    expect(config.port).toBe(3000);
    expect(config.routeFile).toBeUndefined();
    expect(config.routeServiceUrl).toBeUndefined();
    expect(config.logLevel).toBeUndefined();
    expect(config.navigation).toEqual({
      ...DEFAULT_NAVIGATION_SETTINGS,
      guidance: { highwayMode: false }
    });
  });

  test('requires the server credentials', () => {
    expect(() => loadAppConfig({ PACKAGE_NAME: 'com.example.test' })).toThrow(
      'MENTRAOS_API_KEY is not set in .env file'
    );
    expect(() => loadAppConfig({ MENTRAOS_API_KEY: 'test-secret', PACKAGE_NAME: '  ' })).toThrow(
      'PACKAGE_NAME is not set in .env file'
    );
  });

  test('reads route source and guidance settings', () => {
    const config = loadAppConfig({
      ...baseEnv,
      PORT: '8080',
      ROUTE_FILE: 'routes/sample-route.json',
      ROUTE_SERVICE_URL: 'http://localhost:9000',
      ROUTE_SERVICE_API_KEY: 'test-secret',
      OFF_ROUTE_THRESHOLD_METERS: '80',
      HIGHWAY_MODE: 'yes',
      AUTO_ROAD_CLASS: 'false',
      ARRIVAL_THRESHOLD_METERS: '25',
      DISTANCE_UNITS: 'Imperial',
      LOG_LEVEL: 'DEBUG'
    });

    expect(config.port).toBe(8080);
    expect(config.routeFile).toBe('routes/sample-route.json');
    expect(config.routeServiceUrl).toBe('http://localhost:9000');
    expect(config.routeServiceApiKey).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
    expect(config.navigation.highwayMode).toBe(true);
    expect(config.navigation.autoRoadClass).toBe(false);
    expect(config.navigation.arrivalThresholdMeters).toBe(25);
    expect(config.navigation.distanceUnits).toBe('imperial');
    expect(config.navigation.guidance).toEqual({ offRouteThresholdMeters: 80, highwayMode: true });
  });

  test('rejects values it cannot parse', () => {
    expect(() => loadAppConfig({ ...baseEnv, PORT: 'abc' })).toThrow('PORT must be a non-negative number, got "abc"');
    expect(() => loadAppConfig({ ...baseEnv, HIGHWAY_MODE: 'maybe' })).toThrow(
      'HIGHWAY_MODE must be true or false, got "maybe"'
    );
    expect(() => loadAppConfig({ ...baseEnv, LOG_LEVEL: 'verbose' })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, silent, got "verbose"'
    );
    expect(() => loadAppConfig({ ...baseEnv, DISTANCE_UNITS: 'nautical' })).toThrow(
      'DISTANCE_UNITS must be one of metric, imperial, got "nautical"'
    );
  });
});

describe('loadGuidanceOptions', () => {
  test('maps every tunable', () => {
    expect(
      loadGuidanceOptions({
        OFF_ROUTE_THRESHOLD_METERS: '40',
        HIGHWAY_OFF_ROUTE_THRESHOLD_METERS: '100',
        REROUTE_MIN_CONSECUTIVE_FIXES: '4',
        REROUTE_MIN_DURATION_MS: '8000',
        BACKWARD_TOLERANCE_POINTS: '6',
        BACKWARD_CORRECTION_FACTOR: '2.5',
        LOW_CONFIDENCE_ACCURACY_METERS: '30',
        HOLD_PROGRESS_ON_LOW_CONFIDENCE: 'true'
      })
    ).toEqual({
      offRouteThresholdMeters: 40,
      highwayOffRouteThresholdMeters: 100,
      rerouteMinConsecutiveFixes: 4,
      rerouteMinDurationMs: 8000,
      backwardToleranceIndices: 6,
      backwardCorrectionFactor: 2.5,
      lowConfidenceAccuracyMeters: 30,
      holdProgressOnLowConfidence: true
    });
  });

  test('leaves unset tunables undefined', () => {
    expect(loadGuidanceOptions({})).toEqual({});
  });
});
