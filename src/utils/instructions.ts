/**
 * Navigation Instructions Utility Functions
 * Maneuver-kind parsing, instruction cleanup and spoken-announcement formatting
 */

import { Maneuver, ManeuverKind, MANEUVER_KINDS, RoadClass } from '../types/navigation.js';

/**
 * Fallback text for maneuvers whose provider sent no instruction
 */
export const MANEUVER_INSTRUCTIONS: Record<ManeuverKind, string> = {
  'turn-left': 'Turn left',
  'turn-right': 'Turn right',
  'merge': 'Merge',
  'exit': 'Take exit',
  'keep-left': 'Keep left',
  'keep-right': 'Keep right',
  'u-turn': 'Make a U-turn',
  'arrive': 'You have arrived',
  'continue': 'Continue straight',
  'other': 'Continue on the route'
};

// Applied in order; case-normalizes the lead verb so it reads mid-sentence
const ANNOUNCEMENT_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['Turn right', 'turn right'],
  ['Turn left', 'turn left'],
  ['Continue straight', 'continue straight'],
  ['Take exit', 'take exit'],
  ['Merge', 'merge'],
  ['Keep right', 'keep right'],
  ['Keep left', 'keep left'],
  ['Make a U-turn', 'make a u-turn']
];

const ARRIVAL_PATTERN = /You have arrived(?: at your destination)?/g;

const HIGHWAY_ROAD_PATTERN =
  /\b(interstate|highway|hwy|freeway|expressway|motorway|turnpike|tollway)\b|\b(I|US|SR)[- ]?\d+\b/i;

const isManeuverKind = (value: string): value is ManeuverKind =>
  MANEUVER_KINDS.some((kind) => kind === value);

/**
 * Map a provider maneuver/action code to a maneuver kind.
 * Accepts kebab, snake and camel case ("turnLeft", "turn_left", "uturn-right", "off-ramp").
 */
export function parseManeuverKind(raw: string | undefined): ManeuverKind {
  if (!raw) return 'other';

  const code = raw
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1-$2')
    .toLowerCase()
    .replace(/[\s_]+/g, '-');

  if (isManeuverKind(code)) return code;

  if (code.includes('uturn') || code.includes('u-turn')) return 'u-turn';
  if (code.startsWith('roundabout')) return 'other';
  if (code.startsWith('turn')) {
    if (code.includes('left')) return 'turn-left';
    if (code.includes('right')) return 'turn-right';
    return 'other';
  }
  if (code.startsWith('merge') || code === 'on-ramp') return 'merge';
  if (code === 'off-ramp' || code.startsWith('exit') || code.startsWith('ramp')) return 'exit';
  if (code.startsWith('fork') || code.startsWith('keep')) {
    if (code.includes('left')) return 'keep-left';
    if (code.includes('right')) return 'keep-right';
    return 'continue';
  }
  if (code.startsWith('arrive') || code === 'destination') return 'arrive';
  if (['continue-straight', 'straight', 'depart', 'new-name'].includes(code)) return 'continue';

  return 'other';
}

/**
 * Extract maneuver kind from free instruction text
 * @returns Maneuver kind or 'continue' as default
 */
export function extractManeuverKind(instruction: string): ManeuverKind {
  const lowerInstruction = instruction.toLowerCase();

  if (lowerInstruction.includes('u-turn') || lowerInstruction.includes('u turn')) return 'u-turn';
  if (lowerInstruction.includes('turn left') || lowerInstruction.includes('slight left') || lowerInstruction.includes('sharp left')) return 'turn-left';
  if (lowerInstruction.includes('turn right') || lowerInstruction.includes('slight right') || lowerInstruction.includes('sharp right')) return 'turn-right';
  if (lowerInstruction.includes('merge') || lowerInstruction.includes('on-ramp')) return 'merge';
  if (lowerInstruction.includes('exit') || lowerInstruction.includes('off-ramp')) return 'exit';
  if (lowerInstruction.includes('keep left')) return 'keep-left';
  if (lowerInstruction.includes('keep right')) return 'keep-right';
  if (lowerInstruction.includes('arrive') || lowerInstruction.includes('destination')) return 'arrive';

  return 'continue';
}

/**
 * Extract street name from instruction text
 * @returns Street name or undefined if not found
 */
export function extractStreetName(instruction: string): string | undefined {
  const patterns = [
    /onto\s+([^,.]+)/i,
    /continue\s+on\s+([^,.]+)/i,
    /toward\s+([^,.]+)/i
  ];

  for (const pattern of patterns) {
    const match = instruction.match(pattern);
    if (match && match[1]) {
      return match[1].trim();
    }
  }

  return undefined;
}

/**
 * Strip HTML markup and entities some routing providers put in instructions
 */
export function stripInstructionMarkup(htmlInstruction: string): string {
  let cleaned = htmlInstruction.replace(/<[^>]*>/g, '');

  cleaned = cleaned
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");

  return cleaned.replace(/\s+/g, ' ').trim();
}

/**
 * Lower-case the leading verb of an instruction so it can follow "In 600 meters,"
 */
export function cleanAnnouncementInstruction(instruction: string): string {
  let cleaned = instruction;
  for (const [from, to] of ANNOUNCEMENT_REPLACEMENTS) {
    cleaned = cleaned.split(from).join(to);
  }
  return cleaned.replace(ARRIVAL_PATTERN, 'you have arrived at your destination');
}

/**
 * Spoken distance: exact meters under 100, whole hundreds under 1 km,
 * "1 kilometer" below 2 km, whole kilometers beyond.
 */
export function formatAnnouncementDistance(meters: number): string {
  const distance = Math.max(0, meters);
  if (distance < 100) {
    return `${Math.trunc(distance)} meters`;
  }
  if (distance < 1000) {
    return `${Math.floor(distance / 100) * 100} meters`;
  }
  const kilometers = distance / 1000;
  if (kilometers < 2) {
    return '1 kilometer';
  }
  return `${Math.floor(kilometers)} kilometers`;
}

/**
 * Far announcements carry the distance; within 100 m the instruction stands alone
 */
export function buildAnnouncement(instruction: string, distanceToManeuver: number): string {
  const cleaned = cleanAnnouncementInstruction(instruction);
  if (distanceToManeuver > 100) {
    return `In ${formatAnnouncementDistance(distanceToManeuver)}, ${cleaned}`;
  }
  return cleaned;
}

export function inferRoadClass(maneuver: Maneuver): RoadClass {
  if (maneuver.kind === 'merge' || maneuver.kind === 'exit') return 'highway';
  if (maneuver.exitNumber) return 'highway';
  if (maneuver.roadName && HIGHWAY_ROAD_PATTERN.test(maneuver.roadName)) return 'highway';
  return 'city';
}
