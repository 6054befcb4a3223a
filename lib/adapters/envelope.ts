import { z } from 'zod';
import { SessionRejectedError, TransportError } from '../errors';
import type { DeviceRef, RawDevice } from '../types';
import { identifier, optionalText } from './parse';

// Both backends report "not logged in" / "token invalid" in-band with this code
const NOT_LOGGED_IN_CODE = 9;

const returnCode = z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)]);

export const returnCodeEnvelopeSchema = z.object({
  returncode: returnCode,
  message: z.string().optional(),
});

export const errorEnvelopeSchema = z.object({
  error: z.object({
    errorId: returnCode,
    errorMessage: z.string().optional(),
  }),
});

export const pumpInfoSchema = z.object({
  moduleid: identifier,
  type: z.string().min(1),
  version: optionalText,
  name: optionalText,
  surname: optionalText,
  country: optionalText,
  city: optionalText,
  latitude: optionalText,
  longitude: optionalText,
});

export function checkVendorCode(code: number, message: string | undefined): void {
  if (code === 0) return;
  if (code === NOT_LOGGED_IN_CODE) {
    throw new SessionRejectedError(message || 'Not logged in');
  }
  throw new TransportError('http', message || `Backend reported error ${code}`, {
    statusCode: 200,
    vendorCode: String(code),
  });
}

export function toRawDevice(
  ref: DeviceRef,
  moduleName: string,
  info: z.output<typeof pumpInfoSchema>
): RawDevice {
  return {
    ref,
    moduleName,
    model: info.type,
    firmware: info.version,
    country: info.country,
    city: info.city,
    ownerFirstName: info.name,
    ownerLastName: info.surname,
    latitude: info.latitude,
    longitude: info.longitude,
  };
}
