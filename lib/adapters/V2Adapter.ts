import { z } from 'zod';
import { AuthenticationError, TransportError } from '../errors';
import { Logger, silentLogger } from '../logger';
import type { Clock } from '../RequestSpacer';
import type { AuthorizedCaller } from '../SessionManager';
import type { RawResponse, RequestDescriptor, Transport } from '../Transport';
import type {
  Credentials,
  DeviceRef,
  RawDevice,
  RawRegisterSnapshot,
  SessionGrant,
} from '../types';
import {
  checkVendorCode,
  errorEnvelopeSchema,
  pumpInfoSchema,
  returnCodeEnvelopeSchema,
  toRawDevice,
} from './envelope';
import { identifier, parsePayload } from './parse';
import type { VersionAdapter } from './VersionAdapter';

export const V2_PATHS = {
  token: '/api/v1/auth/token',
  modules: '/api/v1/modules',
  pumpInfo: '/api/v1/pumpinfo',
  registers: (ref: DeviceRef) =>
    `/api/v1/modules/${encodeURIComponent(ref.moduleId)}/units/${encodeURIComponent(ref.unitId)}/registers`,
};

// ── Wire schemas ──

const tokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().int().positive(),
  refresh_expires_in: z.number().int().nonnegative().optional(),
  token_type: z.string().optional(),
});

const modulesSchema = z.object({
  modules: z.array(
    z.object({
      moduleId: identifier,
      moduleName: z.string(),
      units: z.array(z.object({ unitId: identifier })),
    })
  ),
});

// The in-band error block is optional on register responses
const registersEnvelopeSchema = errorEnvelopeSchema.partial();

const registersSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  registers: z.record(
    z.string().regex(/^0x[0-9a-f]+$/i, 'Expected a hexadecimal register address'),
    z.number().finite()
  ),
});

/**
 * 2022+ backend: OAuth-style bearer tokens with refresh, GET endpoints,
 * integer registers keyed by hexadecimal address. Device details come from
 * a per-unit pump info call, as on the legacy backend.
 */
export class V2Adapter implements VersionAdapter {
  readonly version = 'v2' as const;

  constructor(
    private readonly transport: Transport,
    private readonly log: Logger = silentLogger,
    private readonly now: Clock = Date.now
  ) {}

  async login(credentials: Credentials): Promise<SessionGrant> {
    const response = await this.requestToken(
      { grant_type: 'password', username: credentials.username, password: credentials.password },
      'InvalidCredentials',
      'Invalid user name or password'
    );
    return this.toGrant(response);
  }

  async refresh(grant: SessionGrant): Promise<SessionGrant> {
    if (!grant.refreshToken) {
      throw new AuthenticationError('SessionRejected', 'No refresh token available');
    }
    const response = await this.requestToken(
      { grant_type: 'refresh_token', refresh_token: grant.refreshToken },
      'SessionRejected',
      'Refresh token was refused'
    );
    return this.toGrant(response);
  }

  async listDevices(caller: AuthorizedCaller): Promise<RawDevice[]> {
    const response = await caller.request({ method: 'GET', path: V2_PATHS.modules });
    const payload = parsePayload(modulesSchema, response.body, 'modules');

    const devices: RawDevice[] = [];
    for (const module of payload.modules) {
      for (const unit of module.units) {
        const ref = { moduleId: module.moduleId, unitId: unit.unitId };
        const info = await caller.request({
          method: 'GET',
          path: V2_PATHS.pumpInfo,
          query: { moduleid: ref.moduleId, unitid: ref.unitId },
        });

        const envelope = parsePayload(returnCodeEnvelopeSchema, info.body, 'pumpinfo');
        checkVendorCode(envelope.returncode, envelope.message);

        devices.push(
          toRawDevice(ref, module.moduleName, parsePayload(pumpInfoSchema, info.body, 'pumpinfo'))
        );
      }
    }
    this.log.debug(`Found ${devices.length} unit(s) in ${payload.modules.length} module(s)`);
    return devices;
  }

  fetchDeviceData(caller: AuthorizedCaller, ref: DeviceRef): Promise<RawRegisterSnapshot> {
    return this.fetchDeviceRegisters(caller, ref);
  }

  async fetchDeviceRegisters(
    caller: AuthorizedCaller,
    ref: DeviceRef,
    since = 0
  ): Promise<RawRegisterSnapshot> {
    const request: RequestDescriptor = {
      method: 'GET',
      path: V2_PATHS.registers(ref),
      query: { lastUpdateTime: String(since) },
    };
    const response = await caller.request(request);
    const envelope = parsePayload(registersEnvelopeSchema, response.body, 'registers');
    if (envelope.error) {
      checkVendorCode(envelope.error.errorId, envelope.error.errorMessage);
    }
    const payload = parsePayload(registersSchema, response.body, 'registers');
    return { ref, timestamp: payload.timestamp, registers: payload.registers };
  }

  private async requestToken(
    form: Record<string, string>,
    refusal: 'InvalidCredentials' | 'SessionRejected',
    refusalMessage: string
  ): Promise<RawResponse> {
    try {
      return await this.transport.send({ method: 'POST', path: V2_PATHS.token, form });
    } catch (error) {
      if (
        error instanceof TransportError &&
        error.kind === 'http' &&
        (error.statusCode === 400 || error.statusCode === 401)
      ) {
        throw new AuthenticationError(refusal, refusalMessage, { cause: error });
      }
      throw error;
    }
  }

  private toGrant(response: RawResponse): SessionGrant {
    const token = parsePayload(tokenSchema, response.body, 'token');
    const issuedAt = this.now();
    return {
      token: token.access_token,
      expiresAt: issuedAt + token.expires_in * 1000,
      refreshToken: token.refresh_token,
      refreshExpiresAt:
        token.refresh_expires_in === undefined
          ? undefined
          : issuedAt + token.refresh_expires_in * 1000,
    };
  }
}
