import { Agent, fetch, type Dispatcher } from 'undici';
import type {
  NetworkController,
  RequestOptions,
  VlanFetchResult,
} from './NetworkController.js';
import type { CheckerConfig } from '../config/CheckerConfig.js';
import { controllerBaseUrl } from '../config/CheckerConfig.js';
import {
  AuthError,
  CancelledError,
  EnumerationError,
  FetchError,
  describeError,
} from '../errors/CheckerError.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import { isRecord, toDevice, type Device } from '../types/Device.js';
import { toRawVlan } from '../types/Vlan.js';

export interface ControllerClientOptions {
  /**
   * undici dispatcher for all requests. Defaults to an Agent that honours
   * `verifyTls`; tests pass a MockAgent.
   */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Failed HTTP exchange, before it is mapped to a call-specific error
 */
class RequestFailure extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RequestFailure';
  }
}

/**
 * Client for a DNA Center style controller API
 */
export class ControllerClient implements NetworkController {
  readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly config: CheckerConfig,
    options: ControllerClientOptions = {}
  ) {
    this.baseUrl = controllerBaseUrl(config);
    this.logger = options.logger ?? silentLogger;
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher =
      options.dispatcher ??
      new Agent({ connect: { rejectUnauthorized: config.verifyTls } });
  }

  async authenticate(options: RequestOptions = {}): Promise<string> {
    const credentials = Buffer.from(
      `${this.config.username}:${this.config.password}`
    ).toString('base64');

    let body: unknown;
    try {
      body = await this.makeRequest(
        'POST',
        this.config.authPath,
        { Authorization: `Basic ${credentials}` },
        options.signal
      );
    } catch (error) {
      throw this.wrap(error, (message, cause) =>
        new AuthError(`Authentication failed: ${message}`, cause)
      );
    }

    const token = isRecord(body) ? body.Token : undefined;
    if (typeof token !== 'string' || !token) {
      throw new AuthError('Authentication failed: Token not found in response');
    }
    return token;
  }

  async listDevices(token: string, options: RequestOptions = {}): Promise<Device[]> {
    let body: unknown;
    try {
      body = await this.makeRequest(
        'GET',
        this.config.deviceListPath,
        this.tokenHeaders(token),
        options.signal
      );
    } catch (error) {
      throw this.wrap(error, (message, cause) =>
        new EnumerationError(`Failed to get network devices: ${message}`, cause)
      );
    }

    return responseList(body).map(toDevice);
  }

  async fetchDeviceVlans(
    token: string,
    deviceId: string,
    options: RequestOptions = {}
  ): Promise<VlanFetchResult> {
    const path = this.config.deviceVlanPath.replace(
      '{deviceId}',
      encodeURIComponent(deviceId)
    );

    try {
      const body = await this.makeRequest(
        'GET',
        path,
        this.tokenHeaders(token),
        options.signal
      );
      return { ok: true, vlans: responseList(body).map(toRawVlan) };
    } catch (error) {
      const wrapped = this.wrap(error, (message, cause) =>
        new FetchError(
          `Failed to get VLANs for device ${deviceId}: ${message}`,
          deviceId,
          cause
        )
      );
      if (wrapped instanceof CancelledError) throw wrapped;
      return { ok: false, error: wrapped };
    }
  }

  /**
   * Release pooled connections held by the default agent
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private tokenHeaders(token: string): Record<string, string> {
    const header = this.config.tokenHeader;
    const value = header.toLowerCase() === 'authorization' ? `Bearer ${token}` : token;
    return { [header]: value };
  }

  private wrap<E extends Error>(
    error: unknown,
    build: (message: string, cause?: Error) => E
  ): E | CancelledError {
    if (error instanceof CancelledError) return error;
    if (error instanceof RequestFailure) return build(error.message, error.cause);
    return build(describeError(error), error instanceof Error ? error : undefined);
  }

  private async makeRequest(
    method: 'GET' | 'POST',
    path: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (signal?.aborted) throw new CancelledError();

    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug(`${method} ${url}`);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...headers,
        },
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        const snippet = text.slice(0, 200);
        throw new RequestFailure(
          `HTTP ${response.status}${snippet ? `: ${snippet}` : ''}`
        );
      }

      const text = await response.text();
      try {
        return text ? JSON.parse(text) : {};
      } catch (error) {
        throw new RequestFailure(
          'response is not valid JSON',
          error instanceof Error ? error : undefined
        );
      }
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (timedOut) {
        throw new RequestFailure(`request timed out after ${this.config.timeoutMs} ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * The `response` list of a controller payload, `[]` when absent
 */
function responseList(body: unknown): unknown[] {
  if (!isRecord(body)) return [];
  const list = body.response;
  return Array.isArray(list) ? list : [];
}
