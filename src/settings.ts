/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'TotalComfortZones';

/**
 * This must match the name of your plugin as defined the package.json `name` property
 */
export const PLUGIN_NAME = 'homebridge-tcc-zones';

/**
 * Default polling interval in seconds.
 * Every poll is a full zone refresh: one list call per page plus three calls per zone.
 */
export const DEFAULT_POLLING_INTERVAL = 120;

/**
 * Minimum allowed polling interval in seconds
 */
export const MIN_POLLING_INTERVAL = 60;

/**
 * Range HomeKit accepts for a thermostat target, in °C
 */
export const TARGET_TEMPERATURE_RANGE = {
  min: 10,
  max: 32,
} as const;

export const MANUFACTURER = 'Honeywell';
