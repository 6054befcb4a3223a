import { TOKEN_REFRESH_BUFFER_MS } from './config';
import {
  AuthenticationError,
  ParseError,
  SessionRejectedError,
  TransportError,
} from './errors';
import { Logger, silentLogger } from './logger';
import type { Clock } from './RequestSpacer';
import type { RawResponse, RequestDescriptor, Transport } from './Transport';
import type {
  ApiVersion,
  Credentials,
  ModuleListing,
  Session,
  SessionGrant,
} from './types';

export interface SessionAuthenticator {
  readonly version: ApiVersion;
  login(credentials: Credentials): Promise<SessionGrant>;
  /** Non-interactive renewal, for backends that hand out refresh tokens. */
  refresh?(grant: SessionGrant): Promise<SessionGrant>;
}

/** What adapters get instead of the session: the ability to make an authenticated call. */
export interface AuthorizedCaller {
  request(descriptor: RequestDescriptor): Promise<RawResponse>;
  modules(): ModuleListing[] | undefined;
}

export interface SessionManagerOptions {
  refreshBufferMs?: number;
  now?: Clock;
}

export class SessionManager {
  private session: Session | null = null;
  private pending: Promise<Session> | null = null;
  // Bumped by close(); logins started before it must not bring a session back
  private generation = 0;
  private readonly refreshBufferMs: number;
  private readonly now: Clock;

  constructor(
    private readonly credentials: Credentials,
    private readonly authenticator: SessionAuthenticator,
    private readonly transport: Transport,
    private readonly log: Logger = silentLogger,
    options: SessionManagerOptions = {}
  ) {
    if (authenticator.version !== transport.version) {
      throw new Error(
        `Authenticator for ${authenticator.version} cannot share a ${transport.version} transport`
      );
    }
    this.refreshBufferMs = options.refreshBufferMs ?? TOKEN_REFRESH_BUFFER_MS;
    this.now = options.now ?? Date.now;
  }

  isAuthenticated(): boolean {
    return this.session !== null && this.isValid(this.session);
  }

  async ensureSession(): Promise<Session> {
    if (this.session && this.isValid(this.session)) {
      return this.session;
    }
    // Deduplicate concurrent logins: the v2 backend penalizes bursts
    if (this.pending) {
      return this.pending;
    }
    const pending: Promise<Session> = this.establish(this.session, this.generation).finally(() => {
      if (this.pending === pending) {
        this.pending = null;
      }
    });
    this.pending = pending;
    return pending;
  }

  /**
   * Runs `operation` with an authorized caller. A session rejection from the
   * server triggers one re-login and one retry of the operation.
   */
  async withSession<T>(operation: (caller: AuthorizedCaller) => Promise<T>): Promise<T> {
    const session = await this.ensureSession();
    try {
      return await operation(this.callerFor(session));
    } catch (error) {
      if (!isSessionRejection(error)) {
        throw error;
      }
      this.log.debug('Session rejected by server, logging in again');
      this.drop(session);
    }

    const renewed = await this.ensureSession();
    try {
      return await operation(this.callerFor(renewed));
    } catch (error) {
      if (isSessionRejection(error)) {
        this.drop(renewed);
        throw new AuthenticationError(
          'SessionRejected',
          'Server rejected the session again after re-authenticating',
          { cause: error }
        );
      }
      throw error;
    }
  }

  invalidate(): void {
    this.session = null;
  }

  close(): void {
    this.generation++;
    this.session = null;
    this.pending = null;
  }

  // Short-lived sessions renew at half their lifetime instead of never being valid
  private isValid(session: Session): boolean {
    const lifetime = session.expiresAt - session.issuedAt;
    const buffer = Math.max(0, Math.min(this.refreshBufferMs, lifetime / 2));
    return this.now() < session.expiresAt - buffer;
  }

  private canRefresh(session: Session): boolean {
    if (!session.refreshToken || !this.authenticator.refresh) {
      return false;
    }
    return session.refreshExpiresAt === undefined || this.now() < session.refreshExpiresAt;
  }

  // Only drop the session the failed call used; a concurrent caller may already have replaced it
  private drop(session: Session): void {
    if (this.session === session) {
      this.session = null;
    }
  }

  private callerFor(session: Session): AuthorizedCaller {
    return {
      request: (descriptor) => this.transport.call(session, descriptor),
      modules: () => session.modules,
    };
  }

  private async establish(previous: Session | null, generation: number): Promise<Session> {
    try {
      let grant: SessionGrant | undefined;

      if (previous && this.canRefresh(previous) && this.authenticator.refresh) {
        try {
          grant = await this.authenticator.refresh(previous);
          this.log.debug('Session refreshed');
        } catch (error) {
          // A refused refresh token falls back to a full login; anything else surfaces
          if (!(error instanceof AuthenticationError)) {
            throw error;
          }
          this.log.debug(`Refresh refused (${error.message}), logging in again`);
        }
      }

      if (!grant) {
        this.log.info(`Logging in to the ${this.authenticator.version} backend`);
        grant = await this.authenticator.login(this.credentials);
        this.log.debug(`Logged in, session valid until ${new Date(grant.expiresAt).toISOString()}`);
      }

      const session: Session = {
        ...grant,
        modules: grant.modules ?? previous?.modules,
        version: this.authenticator.version,
        issuedAt: this.now(),
      };
      if (generation === this.generation) {
        this.session = session;
      }
      return session;
    } catch (error) {
      if (generation === this.generation) {
        this.session = null;
      }
      throw toAuthenticationError(error);
    }
  }
}

function isSessionRejection(error: unknown): boolean {
  if (error instanceof SessionRejectedError) {
    return true;
  }
  return (
    error instanceof TransportError &&
    error.kind === 'http' &&
    (error.statusCode === 401 || error.statusCode === 403)
  );
}

function toAuthenticationError(error: unknown): unknown {
  if (error instanceof AuthenticationError) {
    return error;
  }
  if (error instanceof TransportError) {
    if (error.kind === 'network') {
      return new AuthenticationError('NetworkFailure', `Login failed: ${error.message}`, {
        cause: error,
      });
    }
    return new AuthenticationError('UnexpectedResponse', `Login failed: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof ParseError) {
    return new AuthenticationError(
      'UnexpectedResponse',
      `Login response not understood: ${error.message}`,
      { cause: error }
    );
  }
  return error;
}
