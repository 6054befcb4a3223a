// ── Versions & Credentials ──

export type ApiVersion = 'v1' | 'v2';

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

// ── Device Addressing ──
// A module is the vendor's network gateway; a unit is a heat pump behind it.

export interface DeviceRef {
  moduleId: string;
  unitId: string;
}

export function formatDeviceId(ref: DeviceRef): string {
  return `${ref.moduleId}_${ref.unitId}`;
}

export function parseDeviceId(id: string): DeviceRef {
  const separator = id.lastIndexOf('_');
  if (separator <= 0 || separator === id.length - 1) {
    throw new TypeError(`Invalid device id "${id}", expected "<moduleId>_<unitId>"`);
  }
  return { moduleId: id.slice(0, separator), unitId: id.slice(separator + 1) };
}

// ── Session ──

/** What an adapter hands back after a login or refresh. */
export interface SessionGrant {
  token: string;
  expiresAt: number;
  refreshToken?: string;
  refreshExpiresAt?: number;
  /** v1 only: the module listing returned with the login response. */
  modules?: ModuleListing[];
}

export interface Session extends SessionGrant {
  version: ApiVersion;
  issuedAt: number;
}

export interface ModuleListing {
  moduleId: string;
  moduleName: string;
  unitIds: string[];
}

// ── Raw (adapter output, still version-specific in its keys) ──

export interface RawDevice {
  ref: DeviceRef;
  moduleName: string;
  model: string;
  firmware?: string;
  country?: string;
  city?: string;
  ownerFirstName?: string;
  ownerLastName?: string;
  latitude?: string;
  longitude?: string;
}

export interface RawRegisterSnapshot {
  ref: DeviceRef;
  /** Server timestamp, epoch seconds. */
  timestamp: number;
  registers: Record<string, number>;
}

// ── Canonical ──

export interface Device {
  id: string;
  ref: DeviceRef;
  moduleId: string;
  unitId: string;
  moduleName: string;
  model: string;
  firmware?: string;
  country?: string;
  city?: string;
  owner: {
    firstName?: string;
    lastName?: string;
  };
  location: {
    latitude?: string;
    longitude?: string;
  };
}

export type DataPointValue = number | boolean | string;

export interface DeviceData {
  deviceId: string;
  updatedAt: Date;
  points: Record<string, DataPointValue>;
  /** Registers the data-point table does not name yet, keyed as received. */
  unmapped: Record<string, number>;
}

export interface RegisterDump {
  deviceId: string;
  updatedAt: Date;
  registers: Record<string, number>;
}

export interface RegisterFetchOptions {
  /** Only registers changed since this time (epoch seconds or Date). */
  since?: number | Date;
}
