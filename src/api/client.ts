import { setTimeout as delay } from 'node:timers/promises';

import type { Logging } from 'homebridge';

import { DeviceNameCache } from './nameCache.js';
import type { PortalResponse } from './session.js';
import { PortalSession } from './session.js';
import type {
  ControlField,
  JsonObject,
  OutdoorWeather,
  TotalComfortClientConfig,
  ZoneListEntry,
  ZoneRecord,
} from './types.js';
import { PortalError, isControlField, isJsonObject } from './types.js';
import { Zone } from './zone.js';
import { mergeZoneRecord } from './zoneRecord.js';

const DEFAULT_BASE_URL = 'https://mytotalconnectcomfort.com';
const MAX_AUTH_ATTEMPTS = 100;
const MAX_ZONE_PAGES = 5;
const MAX_TIMER_MS = 2 ** 31 - 1; // setTimeout fires immediately above this

const INVALID_CREDENTIAL_PHRASES = [
  'The email or password provided is incorrect',
  'The email address is not in the correct format',
];
const UNAUTHORIZED_PHRASE = 'Unauthorized: Access is denied due to invalid credentials';

const ZONE_NAME_PATTERN = /id=\s?"ZoneName"\s?>(.*) Control</;
const LOCATION_ID_PATTERN = /locationId=(\d+)/;
const OUTDOOR_TEMPERATURE_MARKER = 'Control.Model.Property.outdoorTemp,';
const OUTDOOR_HUMIDITY_MARKER = 'Control.Model.Property.outdoorHumidity,';

/**
 * Sleep for a number of seconds, in chunks small enough for a single timer
 */
async function sleepSeconds(seconds: number): Promise<void> {
  let remaining = seconds * 1000;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await delay(chunk);
    remaining -= chunk;
  }
}

/**
 * Pull the location id out of the post-login URL, falling back to the page body
 */
export function extractLocationId(url: string, body: string): number {
  const segment = url.split('portal/')[1]?.split('/')[0] ?? '';
  if (/^\d+$/.test(segment)) {
    return parseInt(segment, 10);
  }

  const match = body.match(LOCATION_ID_PATTERN);
  if (!match) {
    throw new PortalError(`Unable to find a location id in ${url} or its content`, 'location-id');
  }
  return parseInt(match[1], 10);
}

/**
 * HTTP client for the Total Connect Comfort portal
 */
export class TotalComfortClient {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly sleep: (seconds: number) => Promise<void>;
  public readonly log: Logging;

  // Set by a successful login, cleared by deAuthenticate()
  private session?: PortalSession;
  private locationIdValue?: number;

  private readonly nameCache: DeviceNameCache;

  constructor(config: TotalComfortClientConfig, log: Logging) {
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.username = config.username;
    this.password = config.password;
    this.sleep = config.sleep ?? sleepSeconds;
    this.log = log;
    this.nameCache = new DeviceNameCache((deviceId) => this.fetchNameForDeviceId(deviceId));
  }

  get locationId(): number | undefined {
    return this.locationIdValue;
  }

  get isAuthenticated(): boolean {
    return this.session !== undefined;
  }

  /**
   * Log in, backing off exponentially while the portal rate-limits or fails to redirect.
   * Attempt i sleeps 2^i seconds before the next one; there is no cap.
   */
  async authenticate(): Promise<void> {
    for (let attempt = 0; attempt < MAX_AUTH_ATTEMPTS; attempt++) {
      this.log.debug(`Starting authentication attempt #${attempt + 1}`);
      try {
        await this.loginOnce();
        return;
      } catch (error) {
        if (!(error instanceof PortalError) || !error.isRetryable) {
          throw error;
        }
        this.log.warn(`Unable to authenticate at this moment: ${error.message}`);
        const seconds = 2 ** attempt;
        this.log.debug(`Sleeping for ${seconds} seconds`);
        await this.sleep(seconds);
      }
    }

    throw new PortalError('Unable to authenticate. Ran out of tries', 'authentication');
  }

  /**
   * One login attempt on a fresh session. Sets the session and location id on success.
   */
  async loginOnce(): Promise<void> {
    const session = new PortalSession(this.log);
    this.log.debug(`Attempting authentication for ${this.username}`);

    const formData = new URLSearchParams({
      UserName: this.username,
      Password: this.password,
    });

    const result = await session.request(`${this.baseUrl}/portal`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: formData.toString(),
    });

    if (result.status !== 200) {
      throw new PortalError(
        `Unable to authenticate as ${this.username}. Status was: ${result.status}`,
        'authentication',
        result.status,
      );
    }

    if (INVALID_CREDENTIAL_PHRASES.some((phrase) => result.text.includes(phrase))) {
      throw new PortalError(
        `Email (${this.username}) and/or password appear to have been rejected`,
        'credentials-invalid',
        result.status,
      );
    }

    this.log.debug(`Resulting url from authentication: ${result.url}`);

    if (result.url.includes('TooManyAttempts')) {
      throw new PortalError('url denoted that we have made too many attempts', 'too-many-attempts');
    }

    if (!result.url.includes('portal/')) {
      throw new PortalError(`${result.url} did not represent the needed redirect`, 'redirect-missing');
    }

    if (result.url.includes('/Error')) {
      throw new PortalError(`${result.url} denotes an error`, 'login-unexpected');
    }

    this.locationIdValue = extractLocationId(result.url, result.text);
    this.session = session;
    this.log.debug(`Location id is ${this.locationIdValue}`);
    this.log.info(`Authenticated with Total Connect Comfort as ${this.username}`);
  }

  /**
   * Log out of the portal, if logged in
   */
  async deAuthenticate(): Promise<void> {
    if (!this.session) {
      return;
    }

    this.log.debug(`Attempting deauthentication for ${this.username}`);
    const result = await this.session.request(`${this.baseUrl}/portal/Account/LogOff`, { method: 'GET' });

    if (result.status !== 200) {
      throw new PortalError(
        `Unable to deauthenticate as ${this.username}. Status was: ${result.status}`,
        'deauthentication',
        result.status,
      );
    }

    this.session = undefined;
    this.log.debug(`Logged out of TCC server for ${this.username}`);
  }

  private requireSession(): PortalSession {
    if (!this.session) {
      throw new PortalError('Not authenticated', 'unauthorized');
    }
    return this.session;
  }

  /**
   * Make a request expecting JSON back and return the decoded body as-is
   */
  async requestJson(method: string, url: string, data?: unknown): Promise<unknown> {
    const session = this.requireSession();

    const result = await session.request(url, {
      method,
      headers: {
        Accept: 'application/json',
        'X-Requested-With': 'XMLHttpRequest',
        ...(data !== undefined ? { 'Content-Type': 'application/json' } : {}),
      },
      body: data !== undefined ? JSON.stringify(data) : undefined,
    });

    const json = this.parseJson(result.text);

    if (result.status !== 200 || json === null || json === undefined) {
      this.log.error(`Got unexpected response from ${url}: ${result.status}. Data was:\n ${result.text}`);

      if (result.text.includes(UNAUTHORIZED_PHRASE) || result.status === 401) {
        throw new PortalError('Got unauthorized response from server', 'unauthorized', result.status);
      }
      throw new PortalError('Expected json data in the response', 'unexpected', result.status);
    }

    return json;
  }

  private parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }

  /**
   * One page of GetZoneListData. Null once we read past the last page.
   */
  async postZoneListData(pageNum: number): Promise<ZoneListEntry[] | null> {
    let data: unknown;
    try {
      data = await this.requestJson(
        'POST',
        `${this.baseUrl}/portal/Device/GetZoneListData?locationId=${this.locationIdValue}&page=${pageNum}`,
      );
    } catch (error) {
      // The portal errors instead of returning [] past the last page
      if (error instanceof PortalError && error.kind === 'unexpected') {
        this.log.debug(`No zone list data for page ${pageNum}: ${error.message}`);
        return null;
      }
      throw error;
    }

    if (!Array.isArray(data)) {
      if (!data || (isJsonObject(data) && Object.keys(data).length === 0)) {
        return null;
      }
      throw new PortalError(`Unexpected zone list data on page ${pageNum}`, 'unexpected');
    }

    if (data.length === 0) {
      return null;
    }

    return data.map((entry: unknown) => {
      if (!isJsonObject(entry) || typeof entry.DeviceID !== 'number') {
        throw new PortalError(`Zone list entry without a DeviceID on page ${pageNum}`, 'unexpected');
      }
      return { ...entry, DeviceID: entry.DeviceID };
    });
  }

  /**
   * CheckDataSession blob for one device (latestData.uiData / fanData / drData)
   */
  async getCheckDataSession(deviceId: number): Promise<JsonObject> {
    const data = await this.requestJson('GET', `${this.baseUrl}/portal/Device/CheckDataSession/${deviceId}`);
    if (!isJsonObject(data)) {
      throw new PortalError(`Unexpected CheckDataSession data for ${deviceId}`, 'unexpected');
    }
    return data;
  }

  /**
   * Zone name for a device id. Only hits the portal the first time an id is seen.
   */
  async getNameForDeviceId(deviceId: number): Promise<string> {
    return this.nameCache.get(deviceId);
  }

  private async fetchControlPage(deviceId: number): Promise<PortalResponse> {
    const result = await this.requireSession().request(
      `${this.baseUrl}/portal/Device/Control/${deviceId}?page=1`,
      { method: 'GET', headers: { Accept: 'text/html' } },
    );

    if (result.status >= 400) {
      throw new PortalError(
        `Failed to fetch control page for ${deviceId}: ${result.status}`,
        'http',
        result.status,
      );
    }
    return result;
  }

  /**
   * Greps the device control page for the zone name
   */
  private async fetchNameForDeviceId(deviceId: number): Promise<string> {
    const result = await this.fetchControlPage(deviceId);

    const match = result.text.match(ZONE_NAME_PATTERN);
    if (!match) {
      throw new PortalError(`Could not find a zone name for ${deviceId}`, 'name-extraction');
    }

    const name = match[1];
    this.log.debug(`Called portal to say ${deviceId} -> ${name}`);
    return name;
  }

  /**
   * Outdoor temperature and humidity from the device control page's inline script.
   * Each is null if it can't be found.
   */
  async getOutdoorWeatherInfoForZone(deviceId: number): Promise<OutdoorWeather> {
    const result = await this.fetchControlPage(deviceId);

    return {
      OutdoorTemperature: this.scrapeWholeNumber(result.text, OUTDOOR_TEMPERATURE_MARKER, 'outdoor temperature'),
      OutdoorHumidity: this.scrapeWholeNumber(result.text, OUTDOOR_HUMIDITY_MARKER, 'outdoor humidity'),
    };
  }

  private scrapeWholeNumber(text: string, marker: string, label: string): number | null {
    const start = text.indexOf(marker);
    if (start === -1) {
      this.log.warn(`Unable to find the ${label}.`);
      return null;
    }

    const raw = text.slice(start + marker.length).split(')', 1)[0].trim();
    const value = raw === '' ? NaN : Number(raw);
    if (!Number.isFinite(value)) {
      this.log.warn(`Unable to parse the ${label}: ${raw}`);
      return null;
    }
    return Math.trunc(value);
  }

  /**
   * All zones on the account, each merged with its name, status blob and outdoor weather
   */
  async getZonesInfo(): Promise<ZoneRecord[]> {
    const entries: ZoneListEntry[] = [];

    for (let pageNum = 1; pageNum <= MAX_ZONE_PAGES; pageNum++) {
      this.log.debug(`Attempting to get zones for location id, page: ${this.locationIdValue}, ${pageNum}`);
      const data = await this.postZoneListData(pageNum);

      if (!data) {
        if (pageNum === 1) {
          throw new PortalError('No zones were found from GetZoneListData', 'no-zones-found');
        }
        this.log.debug(`Page ${pageNum} is empty`);
        break;
      }

      entries.push(...data);
    }

    const zones: ZoneRecord[] = [];
    for (const entry of entries) {
      const name = await this.getNameForDeviceId(entry.DeviceID);
      const session = await this.getCheckDataSession(entry.DeviceID);
      const weather = await this.getOutdoorWeatherInfoForZone(entry.DeviceID);
      zones.push(mergeZoneRecord(entry, name, session, weather));
    }

    return zones;
  }

  async getAllZones(): Promise<Zone[]> {
    const zones = await this.getZonesInfo();
    return zones.map((info) => new Zone(info, this));
  }

  /**
   * Zone for a name (not a device id)
   */
  async getZoneByName(name: string): Promise<Zone> {
    const zones = await this.getZonesInfo();
    const match = zones.find((zone) => zone.Name === name);
    if (!match) {
      throw new PortalError(`Could not find a zone with the given name: ${name}`, 'zone-name-not-found');
    }
    return new Zone(match, this);
  }

  async getZone(deviceId: number): Promise<Zone> {
    return Zone.fromDeviceId(deviceId, this);
  }

  /**
   * Make changes to thermostat settings the way the control screen does.
   * Fields left out are sent as null, which the portal reads as "no change".
   */
  async submitRawControlChanges(
    deviceId: number,
    changes: Record<string, number | null | undefined>,
  ): Promise<void> {
    const data: Record<ControlField, number | null> = {
      CoolNextPeriod: null,
      CoolSetpoint: null,
      DeviceID: deviceId,
      FanMode: null,
      HeatNextPeriod: null,
      HeatSetpoint: null,
      StatusCool: null,
      StatusHeat: null,
      SystemSwitch: null,
    };

    for (const [key, value] of Object.entries(changes)) {
      if (!isControlField(key)) {
        throw new PortalError(
          `Key: ${key} was not one of the valid keys: ${Object.keys(data).sort().join(', ')}`,
          'invalid-control-key',
        );
      }
      if (value !== undefined) {
        data[key] = value;
      }
    }

    this.log.debug(`Posting data to SubmitControlScreenChanges: ${JSON.stringify(data)}`);

    const result = await this.requestJson('POST', `${this.baseUrl}/portal/Device/SubmitControlScreenChanges`, data);

    const success = isJsonObject(result) ? result.success : undefined;
    if (success !== 1 && success !== true) {
      throw new PortalError(`Success was not returned (success!=1): ${JSON.stringify(result)}`, 'submission-failed');
    }
  }
}
