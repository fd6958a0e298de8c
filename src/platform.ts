import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { TotalComfortClient } from './api/client.js';
import type { ZoneRecord } from './api/types.js';
import { PortalError } from './api/types.js';
import { Zone } from './api/zone.js';
import { readDisplayUnits, readZoneStatus } from './api/zoneRecord.js';
import { OutdoorTemperatureAccessory } from './outdoorTemperatureAccessory.js';
import {
  DEFAULT_POLLING_INTERVAL,
  MIN_POLLING_INTERVAL,
  PLATFORM_NAME,
  PLUGIN_NAME,
} from './settings.js';
import { toCelsius } from './temperature.js';
import { ZoneThermostatAccessory } from './zoneThermostatAccessory.js';

/**
 * Validated plugin configuration
 */
interface TotalComfortSettings {
  username: string;
  password: string;
  pollingInterval: number;
  outdoorSensor: boolean;
}

/**
 * Total Connect Comfort Platform
 * Main platform class that manages one thermostat accessory per zone plus an outdoor sensor
 */
export class TotalComfortPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Cached accessories from disk
  private readonly accessories: Map<string, PlatformAccessory> = new Map();

  // Active accessory handlers, by DeviceID
  private readonly zoneAccessories: Map<number, ZoneThermostatAccessory> = new Map();
  private outdoorSensor?: OutdoorTemperatureAccessory;

  // Latest merged records, by DeviceID
  private latestZones: Map<number, ZoneRecord> = new Map();

  // API client (initialized after config validation)
  private apiClient?: TotalComfortClient;

  // Set when the portal drops the session; the next poll logs in first
  private needsReauthentication = false;

  // Polling timer, and the poll it started that has not finished yet
  private pollingTimer?: NodeJS.Timeout;
  private activePoll?: Promise<void>;

  // Track all registered UUIDs for cleanup
  private registeredUUIDs: string[] = [];

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    this.log.debug('Initializing Total Connect Comfort platform');

    // Wait for Homebridge to finish loading cached accessories
    this.api.on('didFinishLaunching', () => {
      this.log.debug('didFinishLaunching callback');
      return this.setupPlatform().catch((error: unknown) => {
        this.log.error('Unexpected error during platform setup:', error);
      });
    });

    this.api.on('shutdown', () => {
      if (this.pollingTimer) {
        clearInterval(this.pollingTimer);
      }
    });
  }

  /**
   * Called by Homebridge to restore cached accessories
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info('Restoring cached accessory:', accessory.displayName);
    this.accessories.set(accessory.UUID, accessory);
  }

  private readSettings(): TotalComfortSettings | undefined {
    const { username, password, pollingInterval, outdoorSensor } = this.config;

    // Validate required config
    if (typeof username !== 'string' || username === '') {
      this.log.error('Missing required config: username. Please enter your Total Connect Comfort email in the plugin settings.');
      return undefined;
    }

    if (typeof password !== 'string' || password === '') {
      this.log.error('Missing required config: password. Please enter your Total Connect Comfort password in the plugin settings.');
      return undefined;
    }

    return {
      username,
      password,
      pollingInterval: Math.max(
        typeof pollingInterval === 'number' ? pollingInterval : DEFAULT_POLLING_INTERVAL,
        MIN_POLLING_INTERVAL,
      ),
      outdoorSensor: typeof outdoorSensor === 'boolean' ? outdoorSensor : true,
    };
  }

  /**
   * Main setup after Homebridge is ready
   */
  private async setupPlatform(): Promise<void> {
    const settings = this.readSettings();
    if (!settings) {
      return;
    }

    this.apiClient = new TotalComfortClient(
      {
        username: settings.username,
        password: settings.password,
      },
      this.log,
    );

    let zones: ZoneRecord[];
    try {
      await this.apiClient.authenticate();
      zones = await this.apiClient.getZonesInfo();
    } catch (error) {
      if (error instanceof PortalError) {
        this.log.error(`Unable to load zones from Total Connect Comfort: ${error.message}`);
      } else {
        this.log.error('Unexpected error loading zones:', error);
      }
      return;
    }

    // Discover/register accessories
    this.discoverZones(zones);
    if (settings.outdoorSensor) {
      this.discoverOutdoorSensor(zones);
    }
    this.cleanupObsoleteAccessories();

    this.updateAccessories(zones);
    this.startPolling(settings.pollingInterval);
  }

  /**
   * Register one thermostat accessory per zone
   */
  private discoverZones(zones: ZoneRecord[]): void {
    for (const zone of zones) {
      const uuid = this.api.hap.uuid.generate(`tcc-zone-${zone.DeviceID}`);
      this.registeredUUIDs.push(uuid);

      let accessory = this.accessories.get(uuid);

      if (accessory) {
        this.log.info('Restoring zone from cache:', zone.Name);
      } else {
        this.log.info('Adding new zone:', zone.Name);
        accessory = new this.api.platformAccessory(zone.Name, uuid);
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      }

      this.zoneAccessories.set(zone.DeviceID, new ZoneThermostatAccessory(this, accessory, zone.DeviceID));
    }
  }

  /**
   * Register the outdoor sensor, if any zone's control page reports an outdoor temperature
   */
  private discoverOutdoorSensor(zones: ZoneRecord[]): void {
    const locationId = this.apiClient?.locationId;
    if (locationId === undefined || !zones.some((zone) => zone.OutdoorTemperature !== null)) {
      this.log.debug('No outdoor temperature reported, skipping outdoor sensor');
      return;
    }

    const uuid = this.api.hap.uuid.generate(`tcc-outdoor-${locationId}`);
    this.registeredUUIDs.push(uuid);

    let accessory = this.accessories.get(uuid);

    if (accessory) {
      this.log.info('Restoring outdoor sensor from cache');
    } else {
      this.log.info('Adding new outdoor sensor');
      accessory = new this.api.platformAccessory('Outdoor Temperature', uuid);
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    }

    this.outdoorSensor = new OutdoorTemperatureAccessory(this, accessory, locationId);
  }

  /**
   * Remove any cached accessories the account no longer has
   */
  private cleanupObsoleteAccessories(): void {
    for (const [uuid, accessory] of this.accessories) {
      if (!this.registeredUUIDs.includes(uuid)) {
        this.log.info('Removing obsolete accessory:', accessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      }
    }
  }

  /**
   * Start the polling timer
   */
  private startPolling(intervalSeconds: number): void {
    this.log.info(`Starting portal polling every ${intervalSeconds} seconds`);

    this.pollingTimer = setInterval(() => {
      // A re-login can back off for longer than the interval; one poll at a time
      if (this.activePoll) {
        this.log.debug('Previous portal poll is still running, skipping this one');
        return;
      }

      this.activePoll = this.pollApi()
        .catch((error: unknown) => {
          this.log.error('Unexpected error during portal poll:', error);
        })
        .finally(() => {
          this.activePoll = undefined;
        });
    }, intervalSeconds * 1000);
  }

  /**
   * Fetch every zone and update accessories
   */
  private async pollApi(): Promise<void> {
    if (!this.apiClient) {
      return;
    }

    try {
      if (this.needsReauthentication) {
        await this.apiClient.authenticate();
        this.needsReauthentication = false;
      }

      const zones = await this.apiClient.getZonesInfo();
      this.updateAccessories(zones);
    } catch (error) {
      if (error instanceof PortalError) {
        if (error.kind === 'unauthorized') {
          this.log.warn('Portal session expired, logging in again before the next poll');
          this.needsReauthentication = true;
          return;
        }

        if (error.isAuthError) {
          this.log.error(`Authentication failed: ${error.message}`);
        } else {
          this.log.error(`Portal error: ${error.message}`);
        }

        // Mark all accessories as faulted
        for (const handler of this.zoneAccessories.values()) {
          handler.setUnavailable();
        }
        this.outdoorSensor?.setUnavailable();
      } else {
        this.log.error('Unexpected error during portal poll:', error);
      }
    }
  }

  private updateAccessories(zones: ZoneRecord[]): void {
    this.latestZones = new Map(zones.map((zone) => [zone.DeviceID, zone]));

    for (const [deviceId, handler] of this.zoneAccessories) {
      const record = this.latestZones.get(deviceId);
      if (!record) {
        this.log.warn(`Zone ${deviceId} is no longer reported by the portal`);
        handler.setUnavailable();
        continue;
      }

      try {
        const status = readZoneStatus(record);
        handler.clearFault();
        handler.updateStatus(status);
      } catch (error) {
        if (!(error instanceof PortalError)) {
          throw error;
        }
        this.log.warn(`Incomplete data for zone ${record.Name}: ${error.message}`);
        handler.setUnavailable();
      }
    }

    if (this.outdoorSensor) {
      this.updateOutdoorSensor(this.outdoorSensor, zones);
    }
  }

  /**
   * Every zone at a location shares one outdoor reading; the first zone that has one wins
   */
  private updateOutdoorSensor(sensor: OutdoorTemperatureAccessory, zones: ZoneRecord[]): void {
    const source = zones.find((zone) => zone.OutdoorTemperature !== null && typeof zone.DispUnits === 'string');
    if (!source || source.OutdoorTemperature === null) {
      this.log.debug('No zone reported an outdoor temperature this poll');
      return;
    }

    sensor.clearFault();
    sensor.updateTemperature(toCelsius(source.OutdoorTemperature, readDisplayUnits(source)));
  }

  /**
   * Run a control change against a zone's latest record
   */
  async controlZone(deviceId: number, action: (zone: Zone) => Promise<void>): Promise<void> {
    if (!this.apiClient) {
      this.log.error('Cannot change zone - portal client not initialized');
      return;
    }

    if (this.activePoll) {
      await this.activePoll;
    }

    const record = this.latestZones.get(deviceId);
    if (!record) {
      this.log.error(`Cannot change zone ${deviceId} - it has not been loaded from the portal`);
      return;
    }

    try {
      await action(new Zone(record, this.apiClient));
    } catch (error) {
      if (error instanceof PortalError) {
        if (error.kind === 'unauthorized') {
          this.needsReauthentication = true;
        }
        this.log.error(`Failed to change zone ${record.Name}: ${error.message}`);
      } else {
        this.log.error(`Unexpected error changing zone ${record.Name}:`, error);
      }
    }
  }
}
