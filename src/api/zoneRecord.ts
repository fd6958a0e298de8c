import type { JsonObject, OutdoorWeather, ZoneListEntry, ZoneRecord } from './types.js';
import { FanMode, PortalError, SystemMode, isJsonObject } from './types.js';

type LatestDataSection = 'uiData' | 'fanData' | 'drData';

const SYSTEM_MODES: readonly SystemMode[] = Object.values(SystemMode);
const FAN_MODES: readonly FanMode[] = Object.values(FanMode);

const HEATING_MODES: readonly SystemMode[] = [SystemMode.Heat, SystemMode.AutoHeat, SystemMode.EMHeat];
const COOLING_MODES: readonly SystemMode[] = [SystemMode.Cool, SystemMode.AutoCool];

/**
 * Merge the three per-device sources onto a zone list entry.
 * Later sources win name collisions: list entry < scraped name < session blob < weather.
 * DeviceID always stays the list entry's.
 */
export function mergeZoneRecord(
  entry: ZoneListEntry,
  name: string,
  session: JsonObject,
  weather: OutdoorWeather,
): ZoneRecord {
  // A session Name replaces the scraped one, as long as it is text
  const { Name: sessionName, ...sessionFields } = session;
  return {
    ...entry,
    ...sessionFields,
    ...weather,
    DeviceID: entry.DeviceID,
    Name: typeof sessionName === 'string' ? sessionName : name,
  };
}

/**
 * Point-in-time view of the fields the platform displays
 */
export interface ZoneStatus {
  deviceId: number;
  name: string;
  displayUnits: string;
  currentTemperature: number | null;
  heatSetpoint: number;
  coolSetpoint: number;
  systemMode: SystemMode;
  equipmentOutputOn: boolean;
  fanMode: FanMode;
  fanRunning: boolean;
  indoorHumidity: number | null;
  outdoorTemperature: number | null;
}

export function readZoneStatus(record: ZoneRecord): ZoneStatus {
  const ui = latestSection(record, 'uiData');
  const humidity = ui.IndoorHumidity;

  return {
    deviceId: record.DeviceID,
    name: record.Name,
    displayUnits: readDisplayUnits(record),
    currentTemperature: record.DispTempAvailable ? readCurrentTemperature(record) : null,
    heatSetpoint: readNumber(ui, 'HeatSetpoint', 'uiData'),
    coolSetpoint: readNumber(ui, 'CoolSetpoint', 'uiData'),
    systemMode: readSystemMode(record),
    equipmentOutputOn: readEquipmentOutputOn(record),
    fanMode: readFanMode(record),
    fanRunning: readFanRunning(record),
    indoorHumidity: typeof humidity === 'number' ? humidity : null,
    outdoorTemperature: record.OutdoorTemperature,
  };
}

export function latestSection(record: ZoneRecord, section: LatestDataSection): JsonObject {
  const latest = record.latestData;
  if (!isJsonObject(latest)) {
    throw new PortalError(`Zone ${record.DeviceID} has no latestData`, 'missing-data');
  }

  const data = latest[section];
  if (!isJsonObject(data)) {
    throw new PortalError(`Zone ${record.DeviceID} has no latestData.${section}`, 'missing-data');
  }
  return data;
}

export function readNumber(source: JsonObject, field: string, where: string): number {
  const value = source[field];
  if (typeof value !== 'number') {
    throw new PortalError(`Expected a number for ${where}.${field}, got ${JSON.stringify(value)}`, 'missing-data');
  }
  return value;
}

/**
 * Numeric flags (0/1/2...) and booleans both count, non-zero is on
 */
export function readFlag(source: JsonObject, field: string, where: string): boolean {
  const value = source[field];
  if (typeof value === 'boolean') {
    return value;
  }
  return readNumber(source, field, where) !== 0;
}

export function readDisplayUnits(record: ZoneRecord): string {
  const units = record.DispUnits;
  if (typeof units !== 'string') {
    throw new PortalError(`Zone ${record.DeviceID} has no DispUnits`, 'missing-data');
  }
  return units;
}

export function readCurrentTemperature(record: ZoneRecord): number {
  if (!record.DispTempAvailable) {
    throw new PortalError('Temperature is unavailable', 'temperature-unavailable');
  }
  return Math.trunc(readNumber(record, 'DispTemp', 'zone'));
}

export function readSystemMode(record: ZoneRecord): SystemMode {
  const position = readNumber(latestSection(record, 'uiData'), 'SystemSwitchPosition', 'uiData');
  const mode = SYSTEM_MODES.find((candidate) => candidate === position);
  if (mode === undefined) {
    throw new PortalError(`Unknown system switch position: ${position}`, 'missing-data');
  }
  return mode;
}

export function readFanMode(record: ZoneRecord): FanMode {
  const value = readNumber(latestSection(record, 'fanData'), 'fanMode', 'fanData');
  const mode = FAN_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new PortalError(`Unknown fan mode: ${value}`, 'missing-data');
  }
  return mode;
}

export function readFanRunning(record: ZoneRecord): boolean {
  return readFlag(latestSection(record, 'fanData'), 'fanIsRunning', 'fanData');
}

export function readEquipmentOutputOn(record: ZoneRecord): boolean {
  return readFlag(latestSection(record, 'uiData'), 'EquipmentOutputStatus', 'uiData');
}

export function isHeatingMode(mode: SystemMode): boolean {
  return HEATING_MODES.includes(mode);
}

export function isCoolingMode(mode: SystemMode): boolean {
  return COOLING_MODES.includes(mode);
}
