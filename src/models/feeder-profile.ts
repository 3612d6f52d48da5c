/**
 * Feeder Profile - geographic and identity facts of the station
 */

export interface FeederProfile {
  latitude: number;
  longitude: number;
  /** Altitude above sea level in meters */
  altitudeM: number;
  /** IANA timezone identifier */
  timezone: string;
  stationName: string;
}

export const PROFILE_KEYS = {
  timezone: 'FEEDER_TZ',
  latitude: 'FEEDER_LAT',
  longitude: 'FEEDER_LONG',
  altitudeM: 'FEEDER_ALT_M',
  stationName: 'FEEDER_NAME',
} as const;

export const DEFAULT_ALTITUDE_M = 10;
export const DEFAULT_STATION_NAME = 'MyFeeder';
export const DEFAULT_TIMEZONE = 'America/New_York';

/**
 * Timezone menu offered during setup; the last entry asks for free text
 */
export const TIMEZONE_CHOICES: ReadonlyArray<{ zone: string; label: string }> = [
  { zone: 'America/New_York', label: 'US Eastern' },
  { zone: 'America/Chicago', label: 'US Central' },
  { zone: 'America/Denver', label: 'US Mountain' },
  { zone: 'America/Los_Angeles', label: 'US Pacific' },
  { zone: 'Europe/London', label: 'UK' },
  { zone: 'Europe/Paris', label: 'Central Europe' },
  { zone: 'Asia/Tokyo', label: 'Japan' },
  { zone: 'Australia/Sydney', label: 'Australia' },
];

const FEET_PER_METER = 3.28084;

export function metersToFeet(meters: number): number {
  return Math.round(meters * FEET_PER_METER);
}

/**
 * Parse a coordinate; returns an error message when out of range
 */
export function parseCoordinate(
  input: string,
  axis: 'latitude' | 'longitude'
): { value?: number; error?: string } {
  const trimmed = input.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return { error: `${axis} must be a decimal number (e.g. ${axis === 'latitude' ? '40.6892' : '-74.0445'})` };
  }
  const value = Number(trimmed);
  const limit = axis === 'latitude' ? 90 : 180;
  if (value < -limit || value > limit) {
    return { error: `${axis} must be between -${limit} and ${limit}` };
  }
  return { value };
}

export function parseAltitude(input: string): { value?: number; error?: string } {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { value: DEFAULT_ALTITUDE_M };
  }
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return { error: 'altitude must be a number of meters (e.g. 10)' };
  }
  return { value: Number(trimmed) };
}

/**
 * Build a profile from stored KEY=value entries; undefined when incomplete
 */
export function profileFromValues(values: Readonly<Record<string, string>>): FeederProfile | undefined {
  const lat = parseCoordinate(values[PROFILE_KEYS.latitude] ?? '', 'latitude');
  const lon = parseCoordinate(values[PROFILE_KEYS.longitude] ?? '', 'longitude');
  const alt = parseAltitude(values[PROFILE_KEYS.altitudeM] ?? '');
  if (lat.value === undefined || lon.value === undefined || alt.value === undefined) {
    return undefined;
  }
  return {
    latitude: lat.value,
    longitude: lon.value,
    altitudeM: alt.value,
    timezone: values[PROFILE_KEYS.timezone] || DEFAULT_TIMEZONE,
    stationName: values[PROFILE_KEYS.stationName] || DEFAULT_STATION_NAME,
  };
}

export function profileToValues(profile: FeederProfile): Record<string, string> {
  return {
    [PROFILE_KEYS.timezone]: profile.timezone,
    [PROFILE_KEYS.latitude]: String(profile.latitude),
    [PROFILE_KEYS.longitude]: String(profile.longitude),
    [PROFILE_KEYS.altitudeM]: String(profile.altitudeM),
    [PROFILE_KEYS.stationName]: profile.stationName,
  };
}
