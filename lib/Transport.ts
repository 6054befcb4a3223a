import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { USER_AGENT, VersionSpec } from './config';
import { TransportError, snippet, translateError } from './errors';
import { Logger, silentLogger } from './logger';
import { RequestSpacer } from './RequestSpacer';
import type { ApiVersion, Session } from './types';

export interface RequestDescriptor {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded. */
  form?: Record<string, string>;
}

export interface RawResponse {
  status: number;
  setCookies: string[];
  body: unknown;
}

export class Transport {
  private readonly client: AxiosInstance;
  private readonly spacer: RequestSpacer;

  constructor(
    private readonly spec: VersionSpec,
    private readonly log: Logger = silentLogger,
    spacer?: RequestSpacer
  ) {
    this.spacer = spacer ?? new RequestSpacer(spec.minSpacingMs);
    this.client = axios.create({
      baseURL: spec.baseUrl,
      timeout: spec.timeoutMs,
      // Bodies are decoded here so a malformed payload is told apart from a network failure
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
    });
  }

  get version(): ApiVersion {
    return this.spec.version;
  }

  getBaseUrl(): string {
    return this.spec.baseUrl;
  }

  /** Unauthenticated call, used for login and token refresh. */
  async send(request: RequestDescriptor): Promise<RawResponse> {
    return this.execute(request, {});
  }

  async call(session: Session, request: RequestDescriptor): Promise<RawResponse> {
    if (session.version !== this.spec.version) {
      throw new Error(
        `Session for ${session.version} cannot be used against the ${this.spec.version} backend`
      );
    }
    return this.execute(request, this.authHeaders(session));
  }

  private authHeaders(session: Session): Record<string, string> {
    if (session.version === 'v1') {
      return { Cookie: `PHPSESSID=${session.token}` };
    }
    return { Authorization: `Bearer ${session.token}` };
  }

  private async execute(
    request: RequestDescriptor,
    headers: Record<string, string>
  ): Promise<RawResponse> {
    await this.spacer.acquire();
    this.log.debug(`${request.method} ${request.path} (${this.spec.version})`);

    let response: AxiosResponse<string>;
    try {
      response = await this.client.request<string>({
        method: request.method,
        url: request.path,
        params: request.query,
        data: request.form ? new URLSearchParams(request.form).toString() : undefined,
        headers: request.form
          ? { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' }
          : headers,
      });
    } catch (error) {
      throw translateError(error);
    }

    return {
      status: response.status,
      setCookies: readSetCookies(response.headers['set-cookie']),
      body: decodeBody(response.data, response.status),
    };
  }
}

function readSetCookies(header: unknown): string[] {
  if (Array.isArray(header)) {
    return header.filter((value): value is string => typeof value === 'string');
  }
  return typeof header === 'string' ? [header] : [];
}

function decodeBody(data: unknown, status: number): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new TransportError('decode', 'Response body is not valid JSON', {
      statusCode: status,
      bodySnippet: snippet(data),
      cause: error,
    });
  }
}
