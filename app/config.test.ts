import { describe, expect, it } from 'vitest';
import { parseConfig } from './config';

describe('parseConfig', () => {
  it('falls back to defaults', () => {
    expect(parseConfig([])).toEqual({
      host: '127.0.0.1',
      port: 31337,
      maxClients: 64,
    });
  });

  it('reads each flag', () => {
    expect(
      parseConfig(['--port', '7000', '--host', '0.0.0.0', '--max-clients', '8'])
    ).toEqual({ host: '0.0.0.0', port: 7000, maxClients: 8 });
  });

  it('rejects a non-numeric port', () => {
    expect(() => parseConfig(['--port', 'abc'])).toThrow(
      "--port expects a non-negative integer, got 'abc'"
    );
  });

  it('rejects a flag with no value', () => {
    expect(() => parseConfig(['--max-clients'])).toThrow(
      "--max-clients expects a non-negative integer, got ''"
    );
  });
});
