import nock from 'nock';
import { V2Adapter, V2_PATHS } from '../../../../lib/adapters/V2Adapter';
import {
  AuthenticationError,
  ParseError,
  SessionRejectedError,
  TransportError,
} from '../../../../lib/errors';
import type { AuthorizedCaller } from '../../../../lib/SessionManager';
import { Transport } from '../../../../lib/Transport';
import type { Session } from '../../../../lib/types';
import modules from '../../../fixtures/v2/modules.json';
import pumpInfo from '../../../fixtures/v2/pumpinfo_10021_1.json';
import registers from '../../../fixtures/v2/registers_10021_1.json';
import token from '../../../fixtures/v2/token.json';

const API_BASE = 'https://heatpump.test';
const CREDENTIALS = { username: 'user@test.com', password: 'test-password' };
const NOW = 1_700_000_000_000;
const REGISTERS_PATH = '/api/v1/modules/10021/units/1/registers';

const session: Session = {
  version: 'v2',
  token: 'bearertoken',
  issuedAt: 0,
  expiresAt: Number.MAX_SAFE_INTEGER,
};

describe('V2Adapter', () => {
  let transport: Transport;
  let adapter: V2Adapter;
  let caller: AuthorizedCaller;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    transport = new Transport({ version: 'v2', baseUrl: API_BASE, minSpacingMs: 0, timeoutMs: 1000 });
    adapter = new V2Adapter(transport, undefined, () => NOW);
    caller = {
      request: (descriptor) => transport.call(session, descriptor),
      modules: () => undefined,
    };
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('login', () => {
    it('should exchange credentials for a bearer token', async () => {
      nock(API_BASE)
        .post(V2_PATHS.token, {
          grant_type: 'password',
          username: 'user@test.com',
          password: 'test-password',
        })
        .reply(200, token);

      const grant = await adapter.login(CREDENTIALS);

      expect(grant).toEqual({
        token: 'bearertoken',
        expiresAt: NOW + 300 * 1000,
        refreshToken: 'refreshtoken',
        refreshExpiresAt: NOW + 1800 * 1000,
      });
    });

    it('should reject invalid credentials (401)', async () => {
      nock(API_BASE).post(V2_PATHS.token).reply(401);

      const attempt = adapter.login(CREDENTIALS);

      await expect(attempt).rejects.toBeInstanceOf(AuthenticationError);
      await expect(attempt).rejects.toMatchObject({
        reason: 'InvalidCredentials',
        message: 'Invalid user name or password',
      });
    });

    it('should pass server errors through', async () => {
      nock(API_BASE).post(V2_PATHS.token).reply(500);

      const attempt = adapter.login(CREDENTIALS);

      await expect(attempt).rejects.toBeInstanceOf(TransportError);
      await expect(attempt).rejects.toMatchObject({ kind: 'http', statusCode: 500 });
    });

    it('should reject a token response without an access token', async () => {
      nock(API_BASE).post(V2_PATHS.token).reply(200, { expires_in: 300 });

      const attempt = adapter.login(CREDENTIALS);

      await expect(attempt).rejects.toBeInstanceOf(ParseError);
      await expect(attempt).rejects.toMatchObject({
        field: 'token.access_token',
        rawSnippet: 'undefined',
      });
    });
  });

  describe('refresh', () => {
    it('should trade the refresh token for a new grant', async () => {
      nock(API_BASE)
        .post(V2_PATHS.token, { grant_type: 'refresh_token', refresh_token: 'refreshtoken' })
        .reply(200, { ...token, access_token: 'bearertoken-2' });

      const grant = await adapter.refresh({
        token: 'bearertoken',
        expiresAt: NOW,
        refreshToken: 'refreshtoken',
      });

      expect(grant.token).toBe('bearertoken-2');
      expect(grant.expiresAt).toBe(NOW + 300 * 1000);
    });

    it('should report a refused refresh token as SessionRejected', async () => {
      nock(API_BASE).post(V2_PATHS.token).reply(400, { error: 'invalid_grant' });

      await expect(
        adapter.refresh({ token: 'bearertoken', expiresAt: NOW, refreshToken: 'refreshtoken' })
      ).rejects.toMatchObject({ reason: 'SessionRejected', message: 'Refresh token was refused' });
    });

    it('should refuse to refresh without a refresh token', async () => {
      await expect(adapter.refresh({ token: 'bearertoken', expiresAt: NOW })).rejects.toMatchObject({
        reason: 'SessionRejected',
        message: 'No refresh token available',
      });
    });
  });

  describe('listDevices', () => {
    it('should fetch pump info for every unit in the module listing', async () => {
      nock(API_BASE)
        .get(V2_PATHS.modules)
        .matchHeader('Authorization', 'Bearer bearertoken')
        .reply(200, modules)
        .get(V2_PATHS.pumpInfo)
        .query({ moduleid: '10021', unitid: '1' })
        .matchHeader('Authorization', 'Bearer bearertoken')
        .reply(200, pumpInfo);

      const devices = await adapter.listDevices(caller);

      expect(devices).toEqual([
        {
          ref: { moduleId: '10021', unitId: '1' },
          moduleName: 'Garden House',
          model: 'BAI',
          firmware: '3.1.0',
          country: 'UK',
          city: 'Testville',
          ownerFirstName: 'Test',
          ownerLastName: 'Owner',
          latitude: '51.5',
          longitude: '-1.25',
        },
      ]);
    });

    it('should leave absent optional fields undefined', async () => {
      nock(API_BASE)
        .get(V2_PATHS.modules)
        .reply(200, { modules: [{ moduleId: 'ABC123', moduleName: '', units: [{ unitId: '2' }] }] })
        .get(V2_PATHS.pumpInfo)
        .query({ moduleid: 'ABC123', unitid: '2' })
        .reply(200, { returncode: 0, moduleid: 'ABC123', type: 'BAI', city: null });

      const [device] = await adapter.listDevices(caller);

      expect(device.ref).toEqual({ moduleId: 'ABC123', unitId: '2' });
      expect(device.city).toBeUndefined();
      expect(device.firmware).toBeUndefined();
    });

    it('should report an unknown unit as a vendor error', async () => {
      nock(API_BASE)
        .get(V2_PATHS.modules)
        .reply(200, modules)
        .get(V2_PATHS.pumpInfo)
        .query(true)
        .reply(200, { returncode: 1, message: 'Invalid unit' });

      const attempt = adapter.listDevices(caller);

      await expect(attempt).rejects.toBeInstanceOf(TransportError);
      await expect(attempt).rejects.toMatchObject({
        kind: 'http',
        statusCode: 200,
        vendorCode: '1',
        message: 'Invalid unit',
      });
    });

    it('should treat return code 9 on pump info as a rejected session', async () => {
      nock(API_BASE)
        .get(V2_PATHS.modules)
        .reply(200, modules)
        .get(V2_PATHS.pumpInfo)
        .query(true)
        .reply(200, { returncode: 9, message: 'Token invalid' });

      await expect(adapter.listDevices(caller)).rejects.toBeInstanceOf(SessionRejectedError);
    });
  });

  describe('fetchDeviceRegisters', () => {
    const ref = { moduleId: '10021', unitId: '1' };

    it('should return the registers keyed by address', async () => {
      nock(API_BASE)
        .get(REGISTERS_PATH)
        .query({ lastUpdateTime: '0' })
        .reply(200, registers);

      const snapshot = await adapter.fetchDeviceRegisters(caller, ref);

      expect(snapshot).toEqual({ ref, timestamp: 1760000000, registers: registers.registers });
    });

    it('should pass the update cursor as a query parameter', async () => {
      nock(API_BASE)
        .get(REGISTERS_PATH)
        .query({ lastUpdateTime: '1760000000' })
        .reply(200, { timestamp: 1760000060, registers: { '0x3': 43 } });

      const snapshot = await adapter.fetchDeviceRegisters(caller, ref, 1760000000);

      expect(snapshot.registers).toEqual({ '0x3': 43 });
    });

    it('should treat error id 9 as a rejected session', async () => {
      nock(API_BASE)
        .get(REGISTERS_PATH)
        .query(true)
        .reply(200, { error: { errorId: 9, errorMessage: 'Not available' } });

      await expect(adapter.fetchDeviceData(caller, ref)).rejects.toBeInstanceOf(
        SessionRejectedError
      );
    });

    it('should report other error ids as vendor errors', async () => {
      nock(API_BASE)
        .get(REGISTERS_PATH)
        .query(true)
        .reply(200, { error: { errorId: 3, errorMessage: '' }, timestamp: 1760000000, registers: {} });

      await expect(adapter.fetchDeviceData(caller, ref)).rejects.toMatchObject({
        kind: 'http',
        vendorCode: '3',
        message: 'Backend reported error 3',
      });
    });

    it('should reject register keys that are not addresses', async () => {
      nock(API_BASE)
        .get(REGISTERS_PATH)
        .query(true)
        .reply(200, { timestamp: 1760000000, registers: { A_3: 1 } });

      await expect(adapter.fetchDeviceData(caller, ref)).rejects.toMatchObject({
        field: 'registers.registers.A_3',
        rawSnippet: '1',
      });
    });

    it('should surface 401 responses for the session layer', async () => {
      nock(API_BASE).get(REGISTERS_PATH).query(true).reply(401);

      await expect(adapter.fetchDeviceData(caller, ref)).rejects.toMatchObject({
        kind: 'http',
        statusCode: 401,
      });
    });
  });
});
