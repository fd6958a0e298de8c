import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import { SystemMode } from './api/types.js';
import type { Zone } from './api/zone.js';
import type { ZoneStatus } from './api/zoneRecord.js';
import { isCoolingMode, isHeatingMode } from './api/zoneRecord.js';
import type { TotalComfortPlatform } from './platform.js';
import { MANUFACTURER, TARGET_TEMPERATURE_RANGE } from './settings.js';
import { fromCelsius, toCelsius } from './temperature.js';

/**
 * Zone Thermostat Accessory
 * Exposes one portal zone as a HomeKit Thermostat service
 */
export class ZoneThermostatAccessory {
  private readonly service: Service;
  public readonly accessory: PlatformAccessory;

  // Last state seen from the portal
  private displayUnits = 'F';
  private systemMode: SystemMode = SystemMode.Off;
  private targetTemperature: number = TARGET_TEMPERATURE_RANGE.min;

  constructor(
    private readonly platform: TotalComfortPlatform,
    accessory: PlatformAccessory,
    public readonly deviceId: number,
  ) {
    this.accessory = accessory;

    const info =
      this.accessory.getService(this.platform.Service.AccessoryInformation) ??
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    info
      .setCharacteristic(this.platform.Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(this.platform.Characteristic.Model, 'Total Connect Comfort Thermostat')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, String(deviceId));

    this.service =
      this.accessory.getService(this.platform.Service.Thermostat) ||
      this.accessory.addService(this.platform.Service.Thermostat);

    this.service.setCharacteristic(this.platform.Characteristic.Name, accessory.displayName);

    this.service.getCharacteristic(this.platform.Characteristic.CurrentTemperature).setProps({
      minValue: -50,
      maxValue: 100,
    });

    this.service
      .getCharacteristic(this.platform.Characteristic.TargetTemperature)
      .setProps({
        minValue: TARGET_TEMPERATURE_RANGE.min,
        maxValue: TARGET_TEMPERATURE_RANGE.max,
        minStep: 0.5,
      })
      .onGet(this.getTargetTemperature.bind(this))
      .onSet(this.setTargetTemperature.bind(this));

    // AUTO would need both setpoints at once, which the control screen can't express
    this.service
      .getCharacteristic(this.platform.Characteristic.TargetHeatingCoolingState)
      .setProps({
        validValues: [
          this.platform.Characteristic.TargetHeatingCoolingState.OFF,
          this.platform.Characteristic.TargetHeatingCoolingState.HEAT,
          this.platform.Characteristic.TargetHeatingCoolingState.COOL,
        ],
      })
      .onGet(this.getTargetHeatingCoolingState.bind(this))
      .onSet(this.setTargetHeatingCoolingState.bind(this));

    this.platform.log.debug(`Initialized zone thermostat: ${accessory.displayName} (${deviceId})`);
  }

  /**
   * Push a fresh portal reading into HomeKit
   */
  updateStatus(status: ZoneStatus): void {
    const { Characteristic } = this.platform;
    this.displayUnits = status.displayUnits;
    this.systemMode = status.systemMode;

    if (status.currentTemperature !== null) {
      this.service.updateCharacteristic(
        Characteristic.CurrentTemperature,
        toCelsius(status.currentTemperature, status.displayUnits),
      );
    }

    const setpoint = isCoolingMode(status.systemMode) ? status.coolSetpoint : status.heatSetpoint;
    this.targetTemperature = toCelsius(setpoint, status.displayUnits);
    this.service.updateCharacteristic(Characteristic.TargetTemperature, this.targetTemperature);

    this.service.updateCharacteristic(Characteristic.TargetHeatingCoolingState, this.getTargetState());

    let currentState: number = Characteristic.CurrentHeatingCoolingState.OFF;
    if (status.equipmentOutputOn && isHeatingMode(status.systemMode)) {
      currentState = Characteristic.CurrentHeatingCoolingState.HEAT;
    } else if (status.equipmentOutputOn && isCoolingMode(status.systemMode)) {
      currentState = Characteristic.CurrentHeatingCoolingState.COOL;
    }
    this.service.updateCharacteristic(Characteristic.CurrentHeatingCoolingState, currentState);

    this.service.updateCharacteristic(
      Characteristic.TemperatureDisplayUnits,
      status.displayUnits === 'F'
        ? Characteristic.TemperatureDisplayUnits.FAHRENHEIT
        : Characteristic.TemperatureDisplayUnits.CELSIUS,
    );

    if (status.indoorHumidity !== null) {
      this.service.updateCharacteristic(Characteristic.CurrentRelativeHumidity, status.indoorHumidity);
    }

    this.platform.log.debug(
      `Updated ${this.accessory.displayName}: ${status.currentTemperature}°${status.displayUnits}, mode ${status.systemMode}`,
    );
  }

  private getTargetState(): number {
    const { TargetHeatingCoolingState } = this.platform.Characteristic;
    if (isHeatingMode(this.systemMode)) {
      return TargetHeatingCoolingState.HEAT;
    }
    if (isCoolingMode(this.systemMode)) {
      return TargetHeatingCoolingState.COOL;
    }
    return TargetHeatingCoolingState.OFF;
  }

  private async getTargetTemperature(): Promise<CharacteristicValue> {
    return this.targetTemperature;
  }

  private async getTargetHeatingCoolingState(): Promise<CharacteristicValue> {
    return this.getTargetState();
  }

  /**
   * Permanent setpoint for whichever side the zone is running
   */
  private async setTargetTemperature(value: CharacteristicValue): Promise<void> {
    if (typeof value !== 'number') {
      this.platform.log.warn(`Ignoring non-numeric target temperature for ${this.accessory.displayName}: ${value}`);
      return;
    }

    const setpoint = fromCelsius(value, this.displayUnits);
    const cooling = isCoolingMode(this.systemMode);
    this.platform.log.info(
      `Setting ${this.accessory.displayName} ${cooling ? 'cool' : 'heat'} setpoint to ${setpoint}°${this.displayUnits}`,
    );
    this.targetTemperature = value;

    await this.platform.controlZone(this.deviceId, (zone: Zone) =>
      cooling ? zone.setPermanentCoolSetpoint(setpoint) : zone.setPermanentHeatSetpoint(setpoint),
    );
  }

  private async setTargetHeatingCoolingState(value: CharacteristicValue): Promise<void> {
    const { TargetHeatingCoolingState } = this.platform.Characteristic;

    switch (value) {
      case TargetHeatingCoolingState.OFF:
        this.systemMode = SystemMode.Off;
        await this.platform.controlZone(this.deviceId, (zone) => zone.turnSystemOff());
        break;
      case TargetHeatingCoolingState.HEAT:
        this.systemMode = SystemMode.Heat;
        await this.platform.controlZone(this.deviceId, (zone) =>
          zone.submitControlChanges({ SystemSwitch: SystemMode.Heat }),
        );
        break;
      case TargetHeatingCoolingState.COOL:
        this.systemMode = SystemMode.Cool;
        await this.platform.controlZone(this.deviceId, (zone) =>
          zone.submitControlChanges({ SystemSwitch: SystemMode.Cool }),
        );
        break;
      default:
        this.platform.log.warn(`Unsupported mode for ${this.accessory.displayName}: ${value}`);
    }
  }

  /**
   * Mark as unavailable
   */
  setUnavailable(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.GENERAL_FAULT,
    );
  }

  /**
   * Clear fault status
   */
  clearFault(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.NO_FAULT,
    );
  }
}
