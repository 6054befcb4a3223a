import type { AuthorizedCaller, SessionAuthenticator } from '../SessionManager';
import type { DeviceRef, RawDevice, RawRegisterSnapshot } from '../types';

/**
 * One backend generation. Both implementations expose the same capability
 * set; the client picks one at construction time.
 */
export interface VersionAdapter extends SessionAuthenticator {
  listDevices(caller: AuthorizedCaller): Promise<RawDevice[]>;
  fetchDeviceData(caller: AuthorizedCaller, ref: DeviceRef): Promise<RawRegisterSnapshot>;
  /** `since` (epoch seconds) asks the backend for registers changed after that time only. */
  fetchDeviceRegisters(
    caller: AuthorizedCaller,
    ref: DeviceRef,
    since?: number
  ): Promise<RawRegisterSnapshot>;
}
