export { TotalComfortClient, extractLocationId } from './client.js';
export { holdFor, timeOfDay, toNextPeriod } from './holdEnd.js';
export type { HoldDuration, HoldEnd, TimeOfDay } from './holdEnd.js';
export { DeviceNameCache } from './nameCache.js';
export { PortalSession } from './session.js';
export type { PortalRequest, PortalResponse } from './session.js';
export { CONTROL_FIELDS, FanMode, PortalError, SystemMode, isControlField } from './types.js';
export type {
  ControlChanges,
  ControlField,
  JsonObject,
  OutdoorWeather,
  PortalErrorKind,
  TotalComfortClientConfig,
  ZoneListEntry,
  ZoneRecord,
} from './types.js';
export { Zone } from './zone.js';
export type { ZoneOwner } from './zone.js';
export { mergeZoneRecord, readZoneStatus } from './zoneRecord.js';
export type { ZoneStatus } from './zoneRecord.js';
