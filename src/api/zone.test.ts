import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createMockLogger, createMockZoneRecord } from '../test/mocks.js';
import { holdFor, timeOfDay } from './holdEnd.js';
import { FanMode, SystemMode } from './types.js';
import type { ZoneRecord } from './types.js';
import { Zone } from './zone.js';

describe('Zone', () => {
  let owner: {
    log: ReturnType<typeof createMockLogger>;
    getZonesInfo: ReturnType<typeof vi.fn>;
    submitRawControlChanges: ReturnType<typeof vi.fn>;
  };
  let zone: Zone;

  function zoneList(record: ZoneRecord = createMockZoneRecord()): ZoneRecord[] {
    return [record, createMockZoneRecord({ DeviceID: 4402, Name: 'BASEMENT' })];
  }

  beforeEach(() => {
    owner = {
      log: createMockLogger(),
      getZonesInfo: vi.fn().mockResolvedValue(zoneList()),
      submitRawControlChanges: vi.fn().mockResolvedValue(undefined),
    };
    zone = new Zone(createMockZoneRecord(), owner);
  });

  describe('fromDeviceId', () => {
    it('should fill in the record from the zone list', async () => {
      const basement = await Zone.fromDeviceId(4402, owner);

      expect(basement.getName()).toBe('BASEMENT');
      expect(basement.zoneInfo.DeviceID).toBe(4402);
      expect(owner.getZonesInfo).toHaveBeenCalledTimes(1);
    });

    it('should throw for a device that is not listed', async () => {
      await expect(Zone.fromDeviceId(1234, owner)).rejects.toMatchObject({
        kind: 'zone-not-found',
        message: 'Missing device: 1234',
      });
    });
  });

  describe('refreshZoneInfo', () => {
    it('should replace the held record', async () => {
      owner.getZonesInfo.mockResolvedValueOnce(zoneList(createMockZoneRecord({}, { HeatSetpoint: 64 })));

      await zone.refreshZoneInfo();

      expect(zone.zoneInfo).toMatchObject({ latestData: { uiData: { HeatSetpoint: 64 } } });
      expect(owner.log.debug).toHaveBeenCalledWith('Refreshed zone info for 4401');
    });

    it('should throw once the device disappears', async () => {
      owner.getZonesInfo.mockResolvedValueOnce([createMockZoneRecord({ DeviceID: 4402 })]);

      await expect(zone.refreshZoneInfo()).rejects.toMatchObject({ kind: 'zone-not-found' });
    });
  });

  describe('reads', () => {
    it('should not refresh for the name', () => {
      expect(zone.getName()).toBe('HALLWAY');
      expect(owner.getZonesInfo).not.toHaveBeenCalled();
    });

    it('should refresh before every read', async () => {
      await zone.getHeatSetpointRaw();
      await zone.getHeatSetpointRaw();

      expect(owner.getZonesInfo).toHaveBeenCalledTimes(2);
    });

    it('should return fresh values', async () => {
      owner.getZonesInfo
        .mockResolvedValueOnce(zoneList(createMockZoneRecord({}, { CoolSetpoint: 78 })))
        .mockResolvedValueOnce(zoneList(createMockZoneRecord({}, { CoolSetpoint: 74 })));

      await expect(zone.getCoolSetpointRaw()).resolves.toBe(78);
      await expect(zone.getCoolSetpointRaw()).resolves.toBe(74);
    });

    it('should read setpoints', async () => {
      await expect(zone.getHeatSetpointRaw()).resolves.toBe(69);
      await expect(zone.getCoolSetpointRaw()).resolves.toBe(76);
      await expect(zone.getHeatSetpoint()).resolves.toBe('69°F');
      await expect(zone.getCoolSetpoint()).resolves.toBe('76°F');
    });

    it('should truncate setpoints', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({}, { HeatSetpoint: 20.5 })));

      await expect(zone.getHeatSetpointRaw()).resolves.toBe(20);
    });

    it('should read temperatures and humidity', async () => {
      await expect(zone.getCurrentTemperatureRaw()).resolves.toBe(71);
      await expect(zone.getCurrentTemperature()).resolves.toBe('71°F');
      await expect(zone.getIndoorTemperatureRaw()).resolves.toBe(71);
      await expect(zone.getIndoorTemperature()).resolves.toBe('71°F');
      await expect(zone.getIndoorHumidityRaw()).resolves.toBe(44);
      await expect(zone.getIndoorHumidity()).resolves.toBe('44%');
    });

    it('should use the zone display units', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({ DispUnits: 'C', DispTemp: 21 })));

      await expect(zone.getCurrentTemperature()).resolves.toBe('21°C');
    });

    it('should refuse an unavailable temperature', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({ DispTempAvailable: false })));

      await expect(zone.getCurrentTemperatureRaw()).rejects.toMatchObject({ kind: 'temperature-unavailable' });
    });

    it('should read the outdoor temperature', async () => {
      await expect(zone.getOutdoorTemperatureRaw()).resolves.toBe(52);
      await expect(zone.getOutdoorTemperature()).resolves.toBe('52°F');
    });

    it('should pass through a missing outdoor temperature', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({ OutdoorTemperature: null })));

      await expect(zone.getOutdoorTemperatureRaw()).resolves.toBeNull();
      await expect(zone.getOutdoorTemperature()).rejects.toMatchObject({ kind: 'missing-data' });
    });

    it('should read system and fan state', async () => {
      await expect(zone.getSystemMode()).resolves.toBe(SystemMode.Heat);
      await expect(zone.isEquipmentOutputOn()).resolves.toBe(true);
      await expect(zone.getFanMode()).resolves.toBe(FanMode.Auto);
      await expect(zone.isFanRunning()).resolves.toBe(true);
    });
  });

  describe('calling for heat or cool', () => {
    it('should call for heat while heating with output on', async () => {
      await expect(zone.isCallingForHeat()).resolves.toBe(true);
      await expect(zone.isCallingForCool()).resolves.toBe(false);
      // Heat checks mode and output; cool stops at the mode
      expect(owner.getZonesInfo).toHaveBeenCalledTimes(3);
    });

    it('should call for cool while cooling with output on', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({}, { SystemSwitchPosition: 5 })));

      await expect(zone.isCallingForCool()).resolves.toBe(true);
      await expect(zone.isCallingForHeat()).resolves.toBe(false);
    });

    it('should not call for anything with output off', async () => {
      owner.getZonesInfo.mockResolvedValue(zoneList(createMockZoneRecord({}, { EquipmentOutputStatus: 0 })));

      await expect(zone.isCallingForHeat()).resolves.toBe(false);
    });
  });

  describe('controls', () => {
    it('should set a permanent cool setpoint', async () => {
      await zone.setPermanentCoolSetpoint(74);

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, {
        CoolSetpoint: 74,
        StatusHeat: 2,
        StatusCool: 2,
        SystemSwitch: 3,
      });
      expect(owner.log.info).toHaveBeenCalledWith('Setting cool on with a target temp of: 74');
    });

    it('should set a permanent heat setpoint', async () => {
      await zone.setPermanentHeatSetpoint(68);

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, {
        HeatSetpoint: 68,
        StatusHeat: 2,
        StatusCool: 2,
        SystemSwitch: 1,
      });
    });

    it('should hold heat until a time of day', async () => {
      await zone.setTempHeatSetpoint(70, timeOfDay(18, 30));

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, {
        HeatSetpoint: 70,
        StatusHeat: 1,
        StatusCool: 1,
        SystemSwitch: 1,
        HeatNextPeriod: 74,
      });
    });

    it('should let the thermostat pick the cool hold end', async () => {
      await zone.setTempCoolSetpoint(74);

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, {
        CoolSetpoint: 74,
        StatusHeat: 1,
        StatusCool: 1,
        SystemSwitch: 3,
        CoolNextPeriod: null,
      });
    });

    it('should reject a hold of a day or more before submitting', async () => {
      await expect(zone.setTempHeatSetpoint(70, holdFor({ days: 1 }))).rejects.toMatchObject({
        kind: 'invalid-hold-end',
      });
      expect(owner.submitRawControlChanges).not.toHaveBeenCalled();
    });

    it.each([
      ['endHold', { StatusHeat: 0, StatusCool: 0 }],
      ['turnSystemOff', { SystemSwitch: 2 }],
      ['turnFanOn', { FanMode: 1 }],
      ['turnFanAuto', { FanMode: 0 }],
      ['turnFanCirculate', { FanMode: 2 }],
    ] as const)('should submit %s', async (method, changes) => {
      await zone[method]();

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, changes);
    });

    it('should pass raw changes through', async () => {
      await zone.submitControlChanges({ HeatNextPeriod: 12 });

      expect(owner.submitRawControlChanges).toHaveBeenCalledWith(4401, { HeatNextPeriod: 12 });
    });

    it('should propagate a failed submission', async () => {
      owner.submitRawControlChanges.mockRejectedValueOnce(new Error('Success was not returned'));

      await expect(zone.turnFanOn()).rejects.toThrow('Success was not returned');
    });
  });
});
