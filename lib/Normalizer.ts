import { z } from 'zod';
import dataPointTable from './data/datapoints.json';
import { ConversionError } from './errors';
import {
  ApiVersion,
  DataPointValue,
  Device,
  DeviceData,
  RawDevice,
  RawRegisterSnapshot,
  RegisterDump,
  formatDeviceId,
} from './types';

// ── Data-point table ──
// One row per named data point: where each backend keeps it and how to read it.

const registerNames = {
  v1: z.string().regex(/^[A-Z]_\d+$/, 'Expected a register name such as "A_3"'),
  v2: z
    .string()
    .regex(/^0x[0-9a-f]+$/, 'Expected a lower-case hexadecimal address such as "0x3"'),
};

const dataPointSchema = z.discriminatedUnion('type', [
  z.object({
    key: z.string().min(1),
    type: z.literal('float'),
    v1: registerNames.v1,
    v2: registerNames.v2,
    /** v2 sends analog values as integers in 1/scale units. */
    scale: z.number().positive().default(1),
  }),
  z.object({ key: z.string().min(1), type: z.literal('int'), v1: registerNames.v1, v2: registerNames.v2 }),
  z.object({ key: z.string().min(1), type: z.literal('bool'), v1: registerNames.v1, v2: registerNames.v2 }),
  z.object({
    key: z.string().min(1),
    type: z.literal('enum'),
    v1: registerNames.v1,
    v2: registerNames.v2,
    values: z.record(z.string().regex(/^-?\d+$/), z.string().min(1)),
  }),
]);

export type DataPointDefinition = z.output<typeof dataPointSchema>;

export function loadDataPoints(table: unknown): DataPointDefinition[] {
  const definitions = z.array(dataPointSchema).parse(table);
  const seen = new Set<string>();
  for (const definition of definitions) {
    for (const name of [definition.key, `v1:${definition.v1}`, `v2:${definition.v2}`]) {
      if (seen.has(name)) {
        throw new Error(`Duplicate data-point entry "${name}"`);
      }
      seen.add(name);
    }
  }
  return definitions;
}

export const DATA_POINTS: readonly DataPointDefinition[] = loadDataPoints(dataPointTable);

// ── Normalizer ──

export class Normalizer {
  private readonly byRegister = new Map<string, DataPointDefinition>();

  constructor(
    readonly version: ApiVersion,
    definitions: readonly DataPointDefinition[] = DATA_POINTS
  ) {
    for (const definition of definitions) {
      this.byRegister.set(definition[version], definition);
    }
  }

  normalizeDevice(raw: RawDevice): Device {
    return {
      id: formatDeviceId(raw.ref),
      ref: { ...raw.ref },
      moduleId: raw.ref.moduleId,
      unitId: raw.ref.unitId,
      moduleName: raw.moduleName,
      model: raw.model,
      firmware: raw.firmware,
      country: raw.country,
      city: raw.city,
      owner: {
        firstName: raw.ownerFirstName,
        lastName: raw.ownerLastName,
      },
      location: {
        latitude: raw.latitude,
        longitude: raw.longitude,
      },
    };
  }

  normalizeDeviceData(raw: RawRegisterSnapshot): DeviceData {
    const points: Record<string, DataPointValue> = {};
    const unmapped: Record<string, number> = {};

    for (const [register, value] of Object.entries(raw.registers)) {
      const definition = this.byRegister.get(this.registerKey(register));
      if (definition) {
        points[definition.key] = this.coerce(definition, value);
      } else {
        unmapped[register] = value;
      }
    }

    return {
      deviceId: formatDeviceId(raw.ref),
      updatedAt: new Date(raw.timestamp * 1000),
      points,
      unmapped,
    };
  }

  /** Registers pass through untouched: no naming or decoding at this level. */
  normalizeRegisters(raw: RawRegisterSnapshot): RegisterDump {
    return {
      deviceId: formatDeviceId(raw.ref),
      updatedAt: new Date(raw.timestamp * 1000),
      registers: { ...raw.registers },
    };
  }

  private registerKey(register: string): string {
    return this.version === 'v2' ? register.toLowerCase() : register;
  }

  private coerce(definition: DataPointDefinition, raw: number): DataPointValue {
    switch (definition.type) {
      case 'bool':
        if (raw === 0 || raw === 1) {
          return raw === 1;
        }
        break;
      case 'int':
        if (Number.isInteger(raw)) {
          return raw;
        }
        break;
      case 'enum':
        if (Number.isInteger(raw) && Object.hasOwn(definition.values, String(raw))) {
          return definition.values[String(raw)];
        }
        break;
      case 'float':
        if (Number.isFinite(raw)) {
          return this.version === 'v2' ? raw / definition.scale : raw;
        }
        break;
    }
    throw new ConversionError(definition.key, raw);
  }
}
