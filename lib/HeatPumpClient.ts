import { V1Adapter } from './adapters/V1Adapter';
import { V2Adapter } from './adapters/V2Adapter';
import type { VersionAdapter } from './adapters/VersionAdapter';
import { ClientOptions, ResolvedOptions, resolveOptions } from './config';
import { HeatPumpError } from './errors';
import { Logger, silentLogger } from './logger';
import { Normalizer } from './Normalizer';
import { Redactor } from './Redactor';
import { SessionManager } from './SessionManager';
import { Transport } from './Transport';
import {
  ApiVersion,
  Device,
  DeviceData,
  DeviceRef,
  RegisterDump,
  RegisterFetchOptions,
  parseDeviceId,
} from './types';

export class HeatPumpClient {
  private readonly options: ResolvedOptions;
  private readonly log: Logger;
  private readonly transport: Transport;
  private readonly adapter: VersionAdapter;
  private readonly sessions: SessionManager;
  private readonly normalizer: Normalizer;
  private readonly redactor: Redactor | null;

  constructor(options: ClientOptions) {
    this.options = resolveOptions(options);
    this.log = options.logger ?? silentLogger;

    const { versionSpec } = this.options;
    this.transport = new Transport(versionSpec, this.log);
    this.adapter =
      versionSpec.version === 'v1'
        ? new V1Adapter(this.transport, this.log)
        : new V2Adapter(this.transport, this.log);
    this.sessions = new SessionManager(
      this.options.credentials,
      this.adapter,
      this.transport,
      this.log,
      { refreshBufferMs: this.options.refreshBufferMs }
    );
    this.normalizer = new Normalizer(versionSpec.version);
    this.redactor = this.options.redactSensitive ? new Redactor() : null;
  }

  get apiVersion(): ApiVersion {
    return this.options.versionSpec.version;
  }

  getBaseUrl(): string {
    return this.transport.getBaseUrl();
  }

  isAuthenticated(): boolean {
    return this.sessions.isAuthenticated();
  }

  /** Logs in ahead of the first fetch. Optional: every operation does this on demand. */
  async connect(): Promise<void> {
    await this.run('connect', async () => {
      await this.sessions.ensureSession();
    });
  }

  async listDevices(): Promise<Device[]> {
    return this.run('listDevices', async () => {
      const raw = await this.sessions.withSession((caller) => this.adapter.listDevices(caller));
      const devices = raw.map((device) => this.normalizer.normalizeDevice(device));
      this.log.debug(`Listed ${devices.length} device(s)`);
      const redactor = this.redactor;
      return redactor ? devices.map((device) => redactor.redactDevice(device)) : devices;
    });
  }

  async getDeviceData(device: DeviceRef | string): Promise<DeviceData> {
    return this.run('getDeviceData', async () => {
      const ref = this.resolveRef(device);
      const raw = await this.sessions.withSession((caller) =>
        this.adapter.fetchDeviceData(caller, ref)
      );
      const data = this.normalizer.normalizeDeviceData(raw);
      return this.redactor ? this.redactor.redactDeviceData(data) : data;
    });
  }

  async getDeviceRegisters(
    device: DeviceRef | string,
    options: RegisterFetchOptions = {}
  ): Promise<RegisterDump> {
    return this.run('getDeviceRegisters', async () => {
      const ref = this.resolveRef(device);
      const since = toEpochSeconds(options.since);
      const raw = await this.sessions.withSession((caller) =>
        this.adapter.fetchDeviceRegisters(caller, ref, since)
      );
      const dump = this.normalizer.normalizeRegisters(raw);
      return this.redactor ? this.redactor.redactRegisters(dump) : dump;
    });
  }

  /** Drops the session; a later call logs in again. */
  close(): void {
    this.sessions.close();
  }

  private resolveRef(device: DeviceRef | string): DeviceRef {
    const ref = typeof device === 'string' ? parseDeviceId(device) : device;
    return this.redactor ? this.redactor.resolve(ref) : ref;
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof HeatPumpError) {
        throw error.withOperation(operation);
      }
      throw error;
    }
  }
}

function toEpochSeconds(since: number | Date | undefined): number | undefined {
  if (since === undefined) return undefined;
  const seconds = since instanceof Date ? since.getTime() / 1000 : since;
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new TypeError(`Invalid "since" value ${String(since)}, expected epoch seconds or a valid Date`);
  }
  return Math.floor(seconds);
}
