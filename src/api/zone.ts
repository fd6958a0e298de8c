import type { Logging } from 'homebridge';

import type { HoldEnd } from './holdEnd.js';
import { toNextPeriod } from './holdEnd.js';
import type { ControlChanges, FanMode, SystemMode, ZoneRecord } from './types.js';
import { PortalError } from './types.js';
import {
  isCoolingMode,
  isHeatingMode,
  latestSection,
  readCurrentTemperature,
  readDisplayUnits,
  readEquipmentOutputOn,
  readFanMode,
  readFanRunning,
  readNumber,
  readSystemMode,
} from './zoneRecord.js';

/**
 * What a Zone needs from the client that created it
 */
export interface ZoneOwner {
  readonly log: Logging;
  getZonesInfo(): Promise<ZoneRecord[]>;
  submitRawControlChanges(deviceId: number, changes: ControlChanges): Promise<void>;
}

/**
 * A Zone is usually one thermostat.
 * Reads always refresh the whole zone list first; the held record is never trusted as current.
 */
export class Zone {
  public deviceId: number;
  private info: ZoneRecord;

  constructor(
    info: ZoneRecord,
    private readonly owner: ZoneOwner,
  ) {
    this.deviceId = info.DeviceID;
    this.info = info;
  }

  /**
   * Build a Zone for a device id by fetching the zone list
   */
  static async fromDeviceId(deviceId: number, owner: ZoneOwner): Promise<Zone> {
    const zone = new Zone({ DeviceID: deviceId, Name: '', OutdoorTemperature: null, OutdoorHumidity: null }, owner);
    await zone.refreshZoneInfo();
    return zone;
  }

  get zoneInfo(): ZoneRecord {
    return this.info;
  }

  async refreshZoneInfo(): Promise<void> {
    const zones = await this.owner.getZonesInfo();
    const match = zones.find((zone) => zone.DeviceID === this.deviceId);
    if (!match) {
      throw new PortalError(`Missing device: ${this.deviceId}`, 'zone-not-found');
    }

    this.owner.log.debug(`Refreshed zone info for ${this.deviceId}`);
    this.info = match;
  }

  getName(): string {
    return this.info.Name;
  }

  async getSystemMode(): Promise<SystemMode> {
    await this.refreshZoneInfo();
    return readSystemMode(this.info);
  }

  /**
   * Non-zero EquipmentOutputStatus usually means the system is heating or cooling
   */
  async isEquipmentOutputOn(): Promise<boolean> {
    await this.refreshZoneInfo();
    return readEquipmentOutputOn(this.info);
  }

  async isCallingForHeat(): Promise<boolean> {
    return isHeatingMode(await this.getSystemMode()) && (await this.isEquipmentOutputOn());
  }

  async isCallingForCool(): Promise<boolean> {
    return isCoolingMode(await this.getSystemMode()) && (await this.isEquipmentOutputOn());
  }

  async getCurrentTemperatureRaw(): Promise<number> {
    await this.refreshZoneInfo();
    return readCurrentTemperature(this.info);
  }

  async getCurrentTemperature(): Promise<string> {
    return this.withUnit(await this.getCurrentTemperatureRaw());
  }

  async getFanMode(): Promise<FanMode> {
    await this.refreshZoneInfo();
    return readFanMode(this.info);
  }

  async isFanRunning(): Promise<boolean> {
    await this.refreshZoneInfo();
    return readFanRunning(this.info);
  }

  async getHeatSetpointRaw(): Promise<number> {
    return Math.trunc(await this.readUiNumber('HeatSetpoint'));
  }

  async getCoolSetpointRaw(): Promise<number> {
    return Math.trunc(await this.readUiNumber('CoolSetpoint'));
  }

  async getHeatSetpoint(): Promise<string> {
    return this.withUnit(await this.getHeatSetpointRaw());
  }

  async getCoolSetpoint(): Promise<string> {
    return this.withUnit(await this.getCoolSetpointRaw());
  }

  /**
   * Null when the control page did not carry an outdoor temperature
   */
  async getOutdoorTemperatureRaw(): Promise<number | null> {
    await this.refreshZoneInfo();
    return this.info.OutdoorTemperature;
  }

  async getOutdoorTemperature(): Promise<string> {
    const raw = await this.getOutdoorTemperatureRaw();
    if (raw === null) {
      throw new PortalError(`Outdoor temperature is unavailable for ${this.deviceId}`, 'missing-data');
    }
    return this.withUnit(raw);
  }

  async getIndoorTemperatureRaw(): Promise<number> {
    return this.readUiNumber('DispTemperature');
  }

  async getIndoorTemperature(): Promise<string> {
    return this.withUnit(await this.getIndoorTemperatureRaw());
  }

  async getIndoorHumidityRaw(): Promise<number> {
    return this.readUiNumber('IndoorHumidity');
  }

  async getIndoorHumidity(): Promise<string> {
    return `${await this.getIndoorHumidityRaw()}%`;
  }

  /**
   * Low-level passthrough to the client's raw control submission
   */
  async submitControlChanges(changes: ControlChanges): Promise<void> {
    await this.owner.submitRawControlChanges(this.deviceId, changes);
  }

  /**
   * Permanent cool setpoint; also switches the thermostat to Cool
   */
  async setPermanentCoolSetpoint(temperature: number): Promise<void> {
    this.owner.log.info(`Setting cool on with a target temp of: ${temperature}`);
    await this.submitControlChanges({ CoolSetpoint: temperature, StatusHeat: 2, StatusCool: 2, SystemSwitch: 3 });
  }

  /**
   * Permanent heat setpoint; also switches the thermostat to Heat
   */
  async setPermanentHeatSetpoint(temperature: number): Promise<void> {
    this.owner.log.info(`Setting heat on with a target temp of: ${temperature}`);
    await this.submitControlChanges({ HeatSetpoint: temperature, StatusHeat: 2, StatusCool: 2, SystemSwitch: 1 });
  }

  /**
   * Temporary heat hold until `end`, rounded to the nearest quarter hour.
   * Without an end the thermostat picks one (usually its next schedule period).
   */
  async setTempHeatSetpoint(temperature: number, end?: HoldEnd | null): Promise<void> {
    this.owner.log.info(`Setting temp heat on with a target temp of: ${temperature}`);
    await this.submitControlChanges({
      HeatSetpoint: temperature,
      StatusHeat: 1,
      StatusCool: 1,
      SystemSwitch: 1,
      HeatNextPeriod: toNextPeriod(end),
    });
  }

  /**
   * Temporary cool hold until `end`, rounded to the nearest quarter hour
   */
  async setTempCoolSetpoint(temperature: number, end?: HoldEnd | null): Promise<void> {
    this.owner.log.info(`Setting temp cool on with a target temp of: ${temperature}`);
    await this.submitControlChanges({
      CoolSetpoint: temperature,
      StatusHeat: 1,
      StatusCool: 1,
      SystemSwitch: 3,
      CoolNextPeriod: toNextPeriod(end),
    });
  }

  /**
   * Resume the programmed schedule
   */
  async endHold(): Promise<void> {
    this.owner.log.info('Ending hold');
    await this.submitControlChanges({ StatusHeat: 0, StatusCool: 0 });
  }

  async turnSystemOff(): Promise<void> {
    this.owner.log.info('Turning system off');
    await this.submitControlChanges({ SystemSwitch: 2 });
  }

  async turnFanOn(): Promise<void> {
    this.owner.log.info('Turning fan on');
    await this.submitControlChanges({ FanMode: 1 });
  }

  async turnFanAuto(): Promise<void> {
    this.owner.log.info('Turning fan to auto');
    await this.submitControlChanges({ FanMode: 0 });
  }

  async turnFanCirculate(): Promise<void> {
    this.owner.log.info('Turning fan to circulate');
    await this.submitControlChanges({ FanMode: 2 });
  }

  private async readUiNumber(field: string): Promise<number> {
    await this.refreshZoneInfo();
    return readNumber(latestSection(this.info, 'uiData'), field, 'uiData');
  }

  private withUnit(raw: number): string {
    return `${raw}°${readDisplayUnits(this.info)}`;
  }
}
