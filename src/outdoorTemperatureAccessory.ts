import type { PlatformAccessory, Service } from 'homebridge';

import type { TotalComfortPlatform } from './platform.js';
import { MANUFACTURER } from './settings.js';

/**
 * Outdoor Temperature Accessory
 * Exposes the location's outdoor reading (scraped from a zone's control page) as a TemperatureSensor
 */
export class OutdoorTemperatureAccessory {
  private readonly service: Service;
  public readonly accessory: PlatformAccessory;

  constructor(
    private readonly platform: TotalComfortPlatform,
    accessory: PlatformAccessory,
    locationId: number,
  ) {
    this.accessory = accessory;

    const info =
      this.accessory.getService(this.platform.Service.AccessoryInformation) ??
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    info
      .setCharacteristic(this.platform.Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(this.platform.Characteristic.Model, 'Outdoor Sensor')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, `location-${locationId}`);

    this.service =
      this.accessory.getService(this.platform.Service.TemperatureSensor) ||
      this.accessory.addService(this.platform.Service.TemperatureSensor);

    this.service.setCharacteristic(this.platform.Characteristic.Name, accessory.displayName);

    // HomeKit TemperatureSensor has default range of 0-100, outdoor readings go below zero
    this.service.getCharacteristic(this.platform.Characteristic.CurrentTemperature).setProps({
      minValue: -100,
      maxValue: 150,
    });

    this.platform.log.debug(`Initialized outdoor sensor for location ${locationId}`);
  }

  /**
   * Update the temperature reading, in °C
   */
  updateTemperature(value: number): void {
    this.service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, value);
    this.platform.log.debug(`Updated ${this.accessory.displayName}: ${value}°C`);
  }

  /**
   * Mark sensor as unavailable (e.g., portal error)
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
