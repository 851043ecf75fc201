import {
  DEFAULT_MAX_CLIENTS,
  DEFAULT_PORT,
  LOCALHOST,
  type Config,
} from './types';

function _intFlag(parameters: string[], flag: string, fallback: number): number {
  const index = parameters.indexOf(flag);
  if (index === -1) {
    return fallback;
  }
  const raw = parameters[index + 1];
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} expects a non-negative integer, got '${raw ?? ''}'`);
  }
  return value;
}

/** Build the server config from command-line flags (argv without node/script). */
export function parseConfig(parameters: string[]): Config {
  const hostIndex = parameters.indexOf('--host');
  return {
    host: hostIndex !== -1 ? parameters[hostIndex + 1] ?? LOCALHOST : LOCALHOST,
    port: _intFlag(parameters, '--port', DEFAULT_PORT),
    maxClients: _intFlag(parameters, '--max-clients', DEFAULT_MAX_CLIENTS),
  };
}
