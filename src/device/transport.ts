import { NetworkError, errorMessage } from '../errors.js';
import logger from '../logger.js';
import { DeviceEndpoint, endpointUrl, formatEndpoint } from './endpoint.js';

export interface Transport {
  send(endpoint: DeviceEndpoint, command: string): Promise<string>;
}

export interface HttpTransportOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * One GET per call against the device's control endpoint. No retries and no
 * keep-alive session; device command volume is low.
 */
export class HttpTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log = logger.child({ module: 'transport' });

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(endpoint: DeviceEndpoint, command: string): Promise<string> {
    const url = endpointUrl(endpoint, command);
    const started = Date.now();
    this.log.debug(`Requesting '${url}'...`);

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new NetworkError(
          `Timed out after ${this.timeoutMs}ms waiting for '${formatEndpoint(endpoint)}'`,
          { cause: error },
        );
      }
      throw new NetworkError(
        `Could not connect to '${formatEndpoint(endpoint)}': ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const elapsed = Date.now() - started;
    this.log.debug(
      `Response received in ${elapsed}ms [Status: ${response.status} Length: ${body.length}]` +
        (body.length < 16 ? `: ${body}` : ''),
    );

    if (!response.ok) {
      throw new NetworkError(
        `Device '${formatEndpoint(endpoint)}' answered '${command}' with HTTP ${response.status}`,
      );
    }
    return body;
  }
}
