import { PortalError } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A wall-clock time the hold should end at
 */
export interface TimeOfDay {
  kind: 'time';
  hour: number;
  minute: number;
}

/**
 * A hold length measured from now
 */
export interface HoldDuration {
  kind: 'duration';
  milliseconds: number;
}

export type HoldEnd = TimeOfDay | HoldDuration;

export function timeOfDay(hour: number, minute = 0): TimeOfDay {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23 || !Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new PortalError(`Invalid time of day: ${hour}:${minute}`, 'invalid-hold-end');
  }
  return { kind: 'time', hour, minute };
}

export function holdFor(length: { days?: number; hours?: number; minutes?: number }): HoldDuration {
  const minutes = ((length.days ?? 0) * 24 + (length.hours ?? 0)) * 60 + (length.minutes ?? 0);
  return { kind: 'duration', milliseconds: minutes * 60 * 1000 };
}

/**
 * Convert a hold end into the portal's "NextPeriod" slot.
 * Slots are quarter hours: 0 = midnight, 1 = 00:15, ... 96 = the following midnight.
 * A missing end gives null, which lets the thermostat pick.
 */
export function toNextPeriod(end: HoldEnd | null | undefined, now: Date = new Date()): number | null {
  if (end === null || end === undefined) {
    return null;
  }

  switch (end.kind) {
    case 'time':
      return end.hour * 4 + Math.round(end.minute / 15);
    case 'duration': {
      if (end.milliseconds >= DAY_MS) {
        throw new PortalError('The hold duration must be less than a day', 'invalid-hold-end');
      }
      const target = new Date(now.getTime() + end.milliseconds);
      return target.getHours() * 4 + Math.round(target.getMinutes() / 15);
    }
  }

  throw new PortalError(`end must be a time of day or a duration, not ${typeof end}`, 'invalid-hold-end');
}
