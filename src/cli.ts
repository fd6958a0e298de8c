import type { Logging } from 'homebridge';

import { TotalComfortClient } from './api/client.js';
import type { TotalComfortClientConfig } from './api/types.js';
import { PortalError, SystemMode } from './api/types.js';
import { readZoneStatus } from './api/zoneRecord.js';

export type CliClient = Pick<TotalComfortClient, 'authenticate' | 'getAllZones' | 'deAuthenticate'>;

export type CliClientFactory = (config: TotalComfortClientConfig, log: Logging) => CliClient;

const createDefaultClient: CliClientFactory = (config, log) => new TotalComfortClient(config, log);

function systemModeName(mode: SystemMode): string {
  return Object.entries(SystemMode).find(([, value]) => value === mode)?.[0] ?? String(mode);
}

/**
 * Log in with TCC_USERNAME / TCC_PASSWORD, print one line per zone and log out.
 * Resolves to the process exit code.
 */
export async function runCli(
  env: NodeJS.ProcessEnv,
  log: Logging,
  createClient: CliClientFactory = createDefaultClient,
): Promise<number> {
  const username = env.TCC_USERNAME;
  const password = env.TCC_PASSWORD;
  if (!username || !password) {
    log.warn('Warning: TCC_USERNAME and TCC_PASSWORD were not set!');
    return 0;
  }

  const client = createClient({ username, password }, log);

  try {
    await client.authenticate();

    for (const zone of await client.getAllZones()) {
      const status = readZoneStatus(zone.zoneInfo);
      const current = status.currentTemperature === null ? 'unavailable' : `${status.currentTemperature}°${status.displayUnits}`;
      log.info(
        `${status.name} (${status.deviceId}): ${current}, mode ${systemModeName(status.systemMode)}, ` +
          `heat ${status.heatSetpoint}°${status.displayUnits}, cool ${status.coolSetpoint}°${status.displayUnits}`,
      );
    }

    await client.deAuthenticate();
    return 0;
  } catch (error) {
    if (error instanceof PortalError) {
      log.error(`Error: ${error.message}`);
    } else {
      log.error('Unexpected error:', error);
    }
    return 1;
  }
}
