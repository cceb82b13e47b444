/**
 * Announcer
 * Turns the stream of guidance ticks into a bounded set of spoken prompts.
 * Each maneuver is announced once per ladder rung, far rung first.
 */

import { GuidanceTick, RoadClass } from '../types/navigation.js';
import { buildAnnouncement } from '../utils/instructions.js';
import { logDebug, logInfo } from '../utils/logger.js';

export const HIGHWAY_THRESHOLDS: readonly number[] = [1200, 600, 400];
export const CITY_THRESHOLDS: readonly number[] = [250, 150, 80];

export type AnnouncementListener = (text: string) => void;

export interface AnnouncerOptions {
  highwayMode?: boolean;
  highwayThresholds?: readonly number[];
  cityThresholds?: readonly number[];
}

export class Announcer {
  private lastAnnouncedManeuver: number | null = null; // pointIndex of the maneuver
  private lastAnnouncementThreshold = Infinity;
  private highwayMode: boolean;
  private readonly highwayThresholds: readonly number[];
  private readonly cityThresholds: readonly number[];

  constructor(private readonly onAnnouncement: AnnouncementListener, options: AnnouncerOptions = {}) {
    this.highwayMode = options.highwayMode ?? false;
    this.highwayThresholds = sortDescending(options.highwayThresholds ?? HIGHWAY_THRESHOLDS);
    this.cityThresholds = sortDescending(options.cityThresholds ?? CITY_THRESHOLDS);
  }

  /**
   * Process one guidance tick; emits at most one announcement
   * @returns The announced text, or null when nothing fired
   */
  onTick(tick: GuidanceTick): string | null {
    const maneuver = tick.nextManeuver;
    if (!maneuver) return null;

    const distance = tick.distanceToManeuver;
    const isSameManeuver = maneuver.pointIndex === this.lastAnnouncedManeuver;

    // Already announced at this rung or a closer one
    if (isSameManeuver && distance >= this.lastAnnouncementThreshold) {
      return null;
    }

    if (!isSameManeuver) {
      this.lastAnnouncedManeuver = maneuver.pointIndex;
      this.lastAnnouncementThreshold = Infinity;
    }

    const threshold = this.thresholds.find(
      (rung) => distance <= rung && rung < this.lastAnnouncementThreshold
    );
    if (threshold === undefined) return null;

    const announcement = buildAnnouncement(maneuver.instruction, distance);
    logInfo(`🔊 Announcing (${threshold}m rung): ${announcement}`);
    this.onAnnouncement(announcement);
    this.lastAnnouncementThreshold = threshold;

    return announcement;
  }

  setHighwayMode(isHighway: boolean): void {
    if (isHighway !== this.highwayMode) {
      logDebug(`Announcer highway mode: ${isHighway}`);
    }
    this.highwayMode = isHighway;
  }

  setRoadClass(roadClass: RoadClass): void {
    this.setHighwayMode(roadClass === 'highway');
  }

  get isHighwayMode(): boolean {
    return this.highwayMode;
  }

  /**
   * Speak immediately, outside the ladder (arrival, reroute notices)
   */
  announceNow(text: string): void {
    logInfo(`🔊 Announcing now: ${text}`);
    this.onAnnouncement(text);
  }

  /**
   * Forget announcement history; call whenever the route is replaced
   */
  reset(): void {
    this.lastAnnouncedManeuver = null;
    this.lastAnnouncementThreshold = Infinity;
    logDebug('Announcer state reset');
  }

  private get thresholds(): readonly number[] {
    return this.highwayMode ? this.highwayThresholds : this.cityThresholds;
  }
}

const sortDescending = (values: readonly number[]): readonly number[] =>
  [...values].sort((a, b) => b - a);
