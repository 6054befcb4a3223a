import { createHash } from 'crypto';
import { z } from 'zod';
import { FALLBACK_SESSION_TTL_MS } from '../config';
import {
  AuthenticationError,
  ParseError,
  SessionRejectedError,
  TransportError,
  snippet,
} from '../errors';
import { Logger, silentLogger } from '../logger';
import type { Clock } from '../RequestSpacer';
import type { AuthorizedCaller } from '../SessionManager';
import type { Transport } from '../Transport';
import type {
  Credentials,
  DeviceRef,
  ModuleListing,
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
import { identifier, numeric, parsePayload } from './parse';
import type { VersionAdapter } from './VersionAdapter';

export const V1_PATHS = {
  login: '/plugins/mastertherm_login/client_login.php',
  pumpInfo: '/plugins/get_pumpinfo/get_pumpinfo.php',
  pumpData: '/mt/PassiveVizualizationServlet',
} as const;

const SESSION_COOKIE = 'PHPSESSID';

// ── Wire schemas ──

const loginSuccessSchema = z.object({
  modules: z.array(
    z.object({
      id: identifier,
      module_name: z.string(),
      config: z.array(z.object({ mb_addr: identifier })),
    })
  ),
});

const pumpDataSchema = z.object({
  timestamp: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
  data: z.object({
    varFileData: z.record(z.string(), z.record(z.string(), numeric)),
  }),
});

/**
 * Pre-2022 backend: PHP session cookie, form-encoded POSTs, register
 * values as numeric strings grouped in "var files".
 */
export class V1Adapter implements VersionAdapter {
  readonly version = 'v1' as const;

  constructor(
    private readonly transport: Transport,
    private readonly log: Logger = silentLogger,
    private readonly now: Clock = Date.now
  ) {}

  async login(credentials: Credentials): Promise<SessionGrant> {
    const response = await this.transport.send({
      method: 'POST',
      path: V1_PATHS.login,
      form: {
        login: 'login',
        uname: credentials.username,
        upwd: createHash('sha1').update(credentials.password, 'utf8').digest('hex'),
        langid: 'en',
      },
    });

    const envelope = parsePayload(returnCodeEnvelopeSchema, response.body, 'login');
    if (envelope.returncode !== 0) {
      throw new AuthenticationError(
        'InvalidCredentials',
        envelope.message ?? 'Invalid user name or password'
      );
    }

    const account = parsePayload(loginSuccessSchema, response.body, 'login');
    const cookie = findCookie(response.setCookies, SESSION_COOKIE, this.now());
    if (!cookie) {
      throw new AuthenticationError(
        'UnexpectedResponse',
        `Login succeeded but no ${SESSION_COOKIE} cookie was set`
      );
    }

    const modules: ModuleListing[] = account.modules.map((module) => ({
      moduleId: module.id,
      moduleName: module.module_name,
      unitIds: module.config.map((unit) => unit.mb_addr),
    }));
    this.log.debug(`Login returned ${modules.length} module(s)`);

    return {
      token: cookie.value,
      expiresAt: cookie.expiresAt ?? this.now() + FALLBACK_SESSION_TTL_MS,
      modules,
    };
  }

  async listDevices(caller: AuthorizedCaller): Promise<RawDevice[]> {
    const modules = caller.modules();
    if (!modules) {
      throw new SessionRejectedError('Session carries no module listing');
    }

    const devices: RawDevice[] = [];
    for (const module of modules) {
      for (const unitId of module.unitIds) {
        const ref = { moduleId: module.moduleId, unitId };
        const body = await this.post(caller, V1_PATHS.pumpInfo, {
          moduleid: ref.moduleId,
          unitid: ref.unitId,
          application: 'android',
        });

        const envelope = parsePayload(returnCodeEnvelopeSchema, body, 'pumpinfo');
        checkVendorCode(envelope.returncode, envelope.message);

        const info = parsePayload(pumpInfoSchema, body, 'pumpinfo');
        devices.push(toRawDevice(ref, module.moduleName, info));
      }
    }
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
    const body = await this.post(caller, V1_PATHS.pumpData, {
      messageId: '1',
      moduleId: ref.moduleId,
      deviceId: ref.unitId,
      fullRange: 'true',
      errorResponse: 'true',
      lastUpdateTime: String(since),
    });

    const envelope = parsePayload(errorEnvelopeSchema, body, 'pumpdata');
    checkVendorCode(envelope.error.errorId, envelope.error.errorMessage);

    const payload = parsePayload(pumpDataSchema, body, 'pumpdata');
    const registers: Record<string, number> = {};
    for (const [groupId, group] of Object.entries(payload.data.varFileData)) {
      for (const [name, value] of Object.entries(group)) {
        if (Object.hasOwn(registers, name)) {
          const field = `pumpdata.data.varFileData.${groupId}.${name}`;
          throw new ParseError(
            field,
            snippet(value),
            `Register "${name}" appears in more than one group at "${field}"`
          );
        }
        registers[name] = value;
      }
    }

    return { ref, timestamp: payload.timestamp, registers };
  }

  private async post(
    caller: AuthorizedCaller,
    path: string,
    form: Record<string, string>
  ): Promise<unknown> {
    try {
      const response = await caller.request({ method: 'POST', path, form });
      return response.body;
    } catch (error) {
      // An expired PHP session is answered with the HTML login page
      if (
        error instanceof TransportError &&
        error.kind === 'decode' &&
        error.bodySnippet?.trimStart().startsWith('<')
      ) {
        throw new SessionRejectedError('Backend answered with its login page');
      }
      throw error;
    }
  }
}

// ── Cookies ──

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

export interface SessionCookie {
  value: string;
  expiresAt?: number;
}

export function findCookie(
  setCookies: string[],
  name: string,
  now: number
): SessionCookie | undefined {
  for (const header of setCookies) {
    const [pair, ...attributes] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator < 0 || pair.slice(0, separator).trim() !== name) {
      continue;
    }
    const value = pair.slice(separator + 1).trim();
    if (!value) {
      continue;
    }

    let expiresAt: number | undefined;
    for (const attribute of attributes) {
      const [key, ...rest] = attribute.split('=');
      const attrValue = rest.join('=').trim();
      const attrName = key.trim().toLowerCase();
      if (attrName === 'max-age' && /^\d+$/.test(attrValue)) {
        // Max-Age wins over Expires
        expiresAt = now + Number(attrValue) * 1000;
        break;
      }
      if (attrName === 'expires') {
        expiresAt = parseCookieDate(attrValue);
      }
    }
    return { value, expiresAt };
  }
  return undefined;
}

/** Handles both "Wed, 21 Oct 2026 07:28:00 GMT" and the legacy "Wed, 21-Oct-2026 07:28:00 GMT". */
export function parseCookieDate(value: string): number | undefined {
  const match = /(\d{1,2})[- ]([A-Za-z]{3})[- ](\d{2,4}) (\d{2}):(\d{2}):(\d{2})/.exec(value);
  if (match) {
    const [, day, monthName, year, hours, minutes, seconds] = match;
    const month = MONTHS.indexOf(monthName.toLowerCase());
    if (month >= 0) {
      const fullYear = year.length === 2 ? 2000 + Number(year) : Number(year);
      return Date.UTC(
        fullYear,
        month,
        Number(day),
        Number(hours),
        Number(minutes),
        Number(seconds)
      );
    }
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
