/**
 * App Configuration
 * Reads server credentials, the route source and guidance tunables from the environment
 */

import { DistanceUnits, GuidanceOptions, NavigationSettings } from './types/navigation.js';
import { LogLevel } from './utils/logger.js';

export interface AppConfig {
  packageName: string;
  apiKey: string;
  port: number;
  routeFile?: string;
  routeServiceUrl?: string;
  routeServiceApiKey?: string;
  logLevel?: LogLevel;
  navigation: NavigationSettings;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const DISTANCE_UNITS: readonly DistanceUnits[] = ['metric', 'imperial'];

export const DEFAULT_NAVIGATION_SETTINGS: NavigationSettings = {
  guidance: {},
  highwayMode: false,
  autoRoadClass: true,
  arrivalThresholdMeters: 30,
  distanceUnits: 'metric',
  averageSpeedMps: 22.2 // ~80 km/h loaded truck
};

const required = (env: Env, key: string): string => {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`${key} is not set in .env file`);
  }
  return value;
};

const optional = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const optionalNumber = (env: Env, key: string): number | undefined => {
  const value = optional(env, key);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${key} must be a non-negative number, got "${value}"`);
  }
  return parsed;
};

const optionalBoolean = (env: Env, key: string): boolean | undefined => {
  const value = optional(env, key)?.toLowerCase();
  if (value === undefined) return undefined;
  if (['true', '1', 'yes'].includes(value)) return true;
  if (['false', '0', 'no'].includes(value)) return false;
  throw new Error(`${key} must be true or false, got "${value}"`);
};

const optionalLogLevel = (env: Env): LogLevel | undefined => {
  const value = optional(env, 'LOG_LEVEL')?.toLowerCase();
  if (value === undefined) return undefined;
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return level;
};

const optionalDistanceUnits = (env: Env): DistanceUnits | undefined => {
  const value = optional(env, 'DISTANCE_UNITS')?.toLowerCase();
  if (value === undefined) return undefined;
  const units = DISTANCE_UNITS.find((candidate) => candidate === value);
  if (!units) {
    throw new Error(`DISTANCE_UNITS must be one of ${DISTANCE_UNITS.join(', ')}, got "${value}"`);
  }
  return units;
};

export function loadGuidanceOptions(env: Env = process.env): GuidanceOptions {
  return {
    offRouteThresholdMeters: optionalNumber(env, 'OFF_ROUTE_THRESHOLD_METERS'),
    highwayOffRouteThresholdMeters: optionalNumber(env, 'HIGHWAY_OFF_ROUTE_THRESHOLD_METERS'),
    rerouteMinConsecutiveFixes: optionalNumber(env, 'REROUTE_MIN_CONSECUTIVE_FIXES'),
    rerouteMinDurationMs: optionalNumber(env, 'REROUTE_MIN_DURATION_MS'),
    backwardToleranceIndices: optionalNumber(env, 'BACKWARD_TOLERANCE_POINTS'),
    backwardCorrectionFactor: optionalNumber(env, 'BACKWARD_CORRECTION_FACTOR'),
    lowConfidenceAccuracyMeters: optionalNumber(env, 'LOW_CONFIDENCE_ACCURACY_METERS'),
    holdProgressOnLowConfidence: optionalBoolean(env, 'HOLD_PROGRESS_ON_LOW_CONFIDENCE')
  };
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const highwayMode = optionalBoolean(env, 'HIGHWAY_MODE') ?? DEFAULT_NAVIGATION_SETTINGS.highwayMode;

  return {
    packageName: required(env, 'PACKAGE_NAME'),
    apiKey: required(env, 'MENTRAOS_API_KEY'),
    port: optionalNumber(env, 'PORT') ?? 3000,
    routeFile: optional(env, 'ROUTE_FILE'),
    routeServiceUrl: optional(env, 'ROUTE_SERVICE_URL'),
    routeServiceApiKey: optional(env, 'ROUTE_SERVICE_API_KEY'),
    logLevel: optionalLogLevel(env),
    navigation: {
      ...DEFAULT_NAVIGATION_SETTINGS,
      guidance: { ...loadGuidanceOptions(env), highwayMode },
      highwayMode,
      autoRoadClass: optionalBoolean(env, 'AUTO_ROAD_CLASS') ?? DEFAULT_NAVIGATION_SETTINGS.autoRoadClass,
      arrivalThresholdMeters:
        optionalNumber(env, 'ARRIVAL_THRESHOLD_METERS') ?? DEFAULT_NAVIGATION_SETTINGS.arrivalThresholdMeters,
      distanceUnits: optionalDistanceUnits(env) ?? DEFAULT_NAVIGATION_SETTINGS.distanceUnits
    }
  };
}
