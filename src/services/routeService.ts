/**
 * Route Service
 * Loads already-decoded routes (points + maneuvers) from a JSON document on disk
 * or from a route service over HTTP, and turns them into RouteGeometry.
 * Route planning itself happens upstream; these sources only hand back its result.
 */

import axios, { AxiosInstance } from 'axios';
import { promises as fs } from 'fs';
import { Coordinates, Maneuver, RouteRequest } from '../types/navigation.js';
import { RouteGeometry } from './routeGeometry.js';
import { RouteError, isRouteError } from '../utils/errors.js';
import {
  MANEUVER_INSTRUCTIONS,
  extractManeuverKind,
  extractStreetName,
  parseManeuverKind,
  stripInstructionMarkup
} from '../utils/instructions.js';
import { logInfo, logWarn } from '../utils/logger.js';

export interface RouteSource {
  /** Human-readable origin of routes, used in logs and errors */
  readonly description: string;
  fetchRoute(request?: RouteRequest): Promise<RouteGeometry>;
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const optionalNumber = (record: JsonRecord, key: string, context: string): number | undefined => {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!isFiniteNumber(value)) {
    throw RouteError.invalid(`${context}.${key} must be a number`);
  }
  return value;
};

const optionalString = (record: JsonRecord, key: string, context: string): string | undefined => {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw RouteError.invalid(`${context}.${key} must be a string`);
  }
  return value;
};

function parsePoint(value: unknown, index: number): Coordinates {
  if (!isRecord(value) || !isFiniteNumber(value.lat) || !isFiniteNumber(value.lng)) {
    throw RouteError.invalid(`points[${index}] must be { lat, lng }`);
  }
  return { lat: value.lat, lng: value.lng };
}

function parseManeuver(value: unknown, index: number): Maneuver {
  const context = `maneuvers[${index}]`;
  if (!isRecord(value)) {
    throw RouteError.invalid(`${context} must be an object`);
  }
  if (typeof value.pointIndex !== 'number' || !Number.isInteger(value.pointIndex)) {
    throw RouteError.invalid(`${context}.pointIndex must be an integer`);
  }

  const rawInstruction = optionalString(value, 'instruction', context);
  const instructionText = rawInstruction ? stripInstructionMarkup(rawInstruction) : '';
  const rawKind = optionalString(value, 'kind', context) ?? optionalString(value, 'type', context);
  const kind = rawKind
    ? parseManeuverKind(rawKind)
    : instructionText
      ? extractManeuverKind(instructionText)
      : 'other';
  const instruction = instructionText || MANEUVER_INSTRUCTIONS[kind];

  return {
    pointIndex: value.pointIndex,
    kind,
    instruction,
    exitNumber: optionalString(value, 'exitNumber', context),
    bearingBefore: optionalNumber(value, 'bearingBefore', context) ?? 0,
    bearingAfter: optionalNumber(value, 'bearingAfter', context) ?? 0,
    distanceMeters: optionalNumber(value, 'distanceMeters', context) ?? 0,
    durationSeconds: optionalNumber(value, 'durationSeconds', context),
    roadName: optionalString(value, 'roadName', context) ?? extractStreetName(instruction)
  };
}

/**
 * Validate a decoded-route JSON value and build its geometry.
 * Cumulative distances are measured from the points when the document omits them.
 */
export function parseRouteDocument(value: unknown): RouteGeometry {
  if (!isRecord(value)) {
    throw RouteError.invalid('document must be an object');
  }
  if (!Array.isArray(value.points)) {
    throw RouteError.invalid('points must be an array');
  }

  if (value.maneuvers !== undefined && !Array.isArray(value.maneuvers)) {
    throw RouteError.invalid('maneuvers must be an array');
  }

  const points = value.points.map(parsePoint);
  const maneuvers = Array.isArray(value.maneuvers) ? value.maneuvers.map(parseManeuver) : [];

  const cumulative = value.cumulativeDistance;
  if (cumulative === undefined || cumulative === null) {
    return RouteGeometry.fromPoints(points, maneuvers);
  }
  if (!Array.isArray(cumulative) || !cumulative.every(isFiniteNumber)) {
    throw RouteError.invalid('cumulativeDistance must be an array of numbers');
  }

  const totalDistance = optionalNumber(value, 'totalDistance', 'document');
  return new RouteGeometry({ points, cumulativeDistance: cumulative, maneuvers, totalDistance });
}

/**
 * Reads a route document from a JSON file. The file holds one fixed route,
 * so it cannot answer reroute requests with a new path.
 */
export class FileRouteSource implements RouteSource {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `file ${filePath}`;
  }

  async fetchRoute(): Promise<RouteGeometry> {
    let document: unknown;
    try {
      const raw = await fs.readFile(this.filePath, 'utf8');
      document = JSON.parse(raw);
    } catch (error) {
      throw RouteError.fetchFailed(this.description, error);
    }

    const route = parseRouteDocument(document);
    logInfo(`🗺️ Loaded route from ${this.filePath}: ${route.points.length} points, ${route.totalDistance.toFixed(0)}m`);
    return route;
  }
}

export interface HttpRouteSourceOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  httpClient?: Pick<AxiosInstance, 'post'>;
}

/**
 * Requests a decoded route from a route service: POST {baseUrl}/route
 * with { origin, destination }, answered by a route document.
 */
export class HttpRouteSource implements RouteSource {
  readonly description: string;
  private readonly endpoint: string;
  private readonly httpClient: Pick<AxiosInstance, 'post'>;

  constructor(options: HttpRouteSourceOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/route`;
    this.description = this.endpoint;
    this.httpClient = options.httpClient ?? axios.create({
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'Accept': 'application/json',
        ...(options.apiKey ? { 'Authorization': `Bearer ${options.apiKey}` } : {})
      }
    });
  }

  async fetchRoute(request?: RouteRequest): Promise<RouteGeometry> {
    if (!request) {
      throw RouteError.invalid('origin and destination are required for a route service request');
    }

    logInfo('🗺️ Requesting route from', {
      endpoint: this.endpoint,
      origin: request.origin,
      destination: request.destination
    });

    try {
      const response = await this.httpClient.post(this.endpoint, {
        origin: request.origin,
        destination: request.destination
      });
      return parseRouteDocument(response.data);
    } catch (error) {
      if (isRouteError(error)) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        logWarn(`⚠️ Route service responded with ${error.response?.status ?? 'no response'}`);
      }
      throw RouteError.fetchFailed(this.description, error);
    }
  }
}
