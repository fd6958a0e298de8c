/**
 * HomeKit works in °C; the portal reports in the zone's display units ('F' or 'C')
 */
export function toCelsius(value: number, units: string): number {
  if (units !== 'F') {
    return value;
  }
  return Math.round((((value - 32) * 5) / 9) * 10) / 10;
}

/**
 * Setpoint in the zone's display units. Fahrenheit setpoints are whole degrees, Celsius ones half degrees.
 */
export function fromCelsius(celsius: number, units: string): number {
  if (units !== 'F') {
    return Math.round(celsius * 2) / 2;
  }
  return Math.round((celsius * 9) / 5 + 32);
}
