/**
 * Total Connect Comfort portal types
 * Shapes inferred from the portal's zone list, CheckDataSession and control screen endpoints
 */

/**
 * Position of the thermostat's system switch (uiData.SystemSwitchPosition)
 */
export const SystemMode = {
  EMHeat: 0,
  Heat: 1,
  Off: 2,
  Cool: 3,
  AutoHeat: 4,
  AutoCool: 5,
  SouthernAway: 6,
  Unknown: 7,
} as const;

export type SystemMode = (typeof SystemMode)[keyof typeof SystemMode];

/**
 * Fan mode (fanData.fanMode)
 */
export const FanMode = {
  Auto: 0,
  On: 1,
  Circulate: 2,
  FollowSchedule: 3,
  Unknown: 4,
} as const;

export type FanMode = (typeof FanMode)[keyof typeof FanMode];

/**
 * Any decoded JSON object. Field types are checked when a field is read, not when it arrives.
 */
export type JsonObject = Record<string, unknown>;

/**
 * One entry of GetZoneListData, e.g.
 * {"DeviceID":123456,"DispTempAvailable":true,"DispUnits":"F","DispTemp":73,"IndoorHumi":38,...}
 */
export interface ZoneListEntry {
  DeviceID: number;
  [field: string]: unknown;
}

/**
 * Outdoor fields scraped from the device control page
 */
export interface OutdoorWeather {
  OutdoorTemperature: number | null;
  OutdoorHumidity: number | null;
}

/**
 * Zone list entry merged with its name, CheckDataSession blob and outdoor weather
 */
export interface ZoneRecord extends ZoneListEntry {
  Name: string;
  OutdoorTemperature: number | null;
  OutdoorHumidity: number | null;
}

/**
 * Fields accepted by SubmitControlScreenChanges. null means "leave unchanged".
 */
export const CONTROL_FIELDS = [
  'CoolNextPeriod',
  'CoolSetpoint',
  'DeviceID',
  'FanMode',
  'HeatNextPeriod',
  'HeatSetpoint',
  'StatusCool',
  'StatusHeat',
  'SystemSwitch',
] as const;

export type ControlField = (typeof CONTROL_FIELDS)[number];

export type ControlChanges = Partial<Record<ControlField, number | null>>;

export function isControlField(key: string): key is ControlField {
  return CONTROL_FIELDS.some((field) => field === key);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * API client configuration
 */
export interface TotalComfortClientConfig {
  username: string;
  password: string;
  baseUrl?: string;    // Default: https://mytotalconnectcomfort.com
  sleep?: (seconds: number) => Promise<void>;
}

export type PortalErrorKind =
  | 'authentication'
  | 'deauthentication'
  | 'credentials-invalid'
  | 'too-many-attempts'
  | 'redirect-missing'
  | 'login-unexpected'
  | 'unauthorized'
  | 'unexpected'
  | 'network'
  | 'http'
  | 'location-id'
  | 'name-extraction'
  | 'zone-not-found'
  | 'no-zones-found'
  | 'zone-name-not-found'
  | 'missing-data'
  | 'temperature-unavailable'
  | 'invalid-control-key'
  | 'invalid-hold-end'
  | 'submission-failed';

const RETRYABLE_KINDS: readonly PortalErrorKind[] = ['too-many-attempts', 'redirect-missing', 'login-unexpected'];

const AUTH_KINDS: readonly PortalErrorKind[] = [
  'authentication',
  'credentials-invalid',
  'too-many-attempts',
  'redirect-missing',
  'login-unexpected',
  'unauthorized',
];

/**
 * Custom error class for portal errors
 */
export class PortalError extends Error {
  constructor(
    message: string,
    public readonly kind: PortalErrorKind = 'unexpected',
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'PortalError';
  }

  /**
   * Login failures the authenticate loop backs off and retries
   */
  get isRetryable(): boolean {
    return RETRYABLE_KINDS.includes(this.kind);
  }

  get isAuthError(): boolean {
    return AUTH_KINDS.includes(this.kind);
  }
}
