/**
 * Lazily filled DeviceID -> zone name lookup.
 * Names are treated as immutable, so entries are never invalidated.
 */
export class DeviceNameCache {
  private readonly names = new Map<number, string>();

  constructor(private readonly fetchName: (deviceId: number) => Promise<string>) {}

  async get(deviceId: number): Promise<string> {
    const cached = this.names.get(deviceId);
    if (cached !== undefined) {
      return cached;
    }

    const name = await this.fetchName(deviceId);
    this.names.set(deviceId, name);
    return name;
  }

  has(deviceId: number): boolean {
    return this.names.has(deviceId);
  }
}
