import type { Device, DeviceData, DeviceRef, RegisterDump } from './types';
import { formatDeviceId, parseDeviceId } from './types';

const FIRST_ALIAS = 1112;

export const REDACTED = {
  moduleName: 'Hidden Name',
  firstName: 'First',
  lastName: 'Last',
  city: 'Hidden City',
  latitude: '1.1',
  longitude: '-0.1',
} as const;

/**
 * Masks identifying values for output that gets shared (debug dumps, bug
 * reports). Module ids become stable numeric pseudonyms; the mapping lives
 * only in this instance so pseudonymous refs can be passed back in.
 */
export class Redactor {
  private readonly aliases = new Map<string, string>();
  private readonly originals = new Map<string, string>();
  private nextAlias = FIRST_ALIAS;

  aliasFor(moduleId: string): string {
    let alias = this.aliases.get(moduleId);
    if (alias === undefined) {
      alias = String(this.nextAlias++);
      this.aliases.set(moduleId, alias);
      this.originals.set(alias, moduleId);
    }
    return alias;
  }

  /** Maps a pseudonymous ref back to the real one; unknown refs pass through. */
  resolve(ref: DeviceRef): DeviceRef {
    const moduleId = this.originals.get(ref.moduleId);
    return moduleId === undefined ? ref : { moduleId, unitId: ref.unitId };
  }

  redactDevice(device: Device): Device {
    const ref = { moduleId: this.aliasFor(device.moduleId), unitId: device.unitId };
    return {
      ...device,
      id: formatDeviceId(ref),
      ref,
      moduleId: ref.moduleId,
      moduleName: REDACTED.moduleName,
      city: device.city === undefined ? undefined : REDACTED.city,
      owner: {
        firstName: REDACTED.firstName,
        lastName: REDACTED.lastName,
      },
      location: {
        latitude: REDACTED.latitude,
        longitude: REDACTED.longitude,
      },
    };
  }

  redactDeviceData(data: DeviceData): DeviceData {
    return { ...data, deviceId: this.redactDeviceId(data.deviceId) };
  }

  redactRegisters(dump: RegisterDump): RegisterDump {
    return { ...dump, deviceId: this.redactDeviceId(dump.deviceId) };
  }

  private redactDeviceId(deviceId: string): string {
    const ref = parseDeviceId(deviceId);
    return formatDeviceId({ moduleId: this.aliasFor(ref.moduleId), unitId: ref.unitId });
  }
}
