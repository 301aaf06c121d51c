import { InvalidArgumentError } from '../errors.js';

export interface DeviceEndpoint {
  readonly host: string;
  readonly port?: number;
}

const CONTROL_PATH = '/httpapi.asp';

export function parseEndpoint(address: string): DeviceEndpoint {
  const trimmed = address.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  if (!trimmed) {
    throw new InvalidArgumentError('Device address must be a non-empty host name or IP address');
  }

  const match = trimmed.match(/^([^:/\s]+)(?::(\d+))?$/);
  if (!match) {
    throw new InvalidArgumentError(`Invalid device address '${address}'`);
  }

  const host = match[1];
  if (match[2] === undefined) {
    return Object.freeze({ host });
  }

  const port = parseInt(match[2], 10);
  if (port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Port must be between 1 and 65535, not '${match[2]}'`);
  }
  return Object.freeze({ host, port });
}

export function formatEndpoint(endpoint: DeviceEndpoint): string {
  return endpoint.port === undefined ? endpoint.host : `${endpoint.host}:${endpoint.port}`;
}

// Existing %XX escapes (in stream URIs) go out as they are.
const ESCAPE_SPLIT = /(%[0-9A-Fa-f]{2})/;

/**
 * Escapes command text for the query string. `:`, `/` and `=` stay literal
 * since the firmware splits commands on them; `#`, `&`, `+` and stray `%` do not.
 */
export function encodeCommand(command: string): string {
  return command
    .split(ESCAPE_SPLIT)
    .map((part, index) =>
      index % 2 === 1
        ? part
        : encodeURIComponent(part).replace(/%3A/g, ':').replace(/%2F/g, '/').replace(/%3D/g, '='),
    )
    .join('');
}

export function endpointUrl(endpoint: DeviceEndpoint, command: string): string {
  return `http://${formatEndpoint(endpoint)}${CONTROL_PATH}?command=${encodeCommand(command)}`;
}
