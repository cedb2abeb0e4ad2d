import {
  getNetworkErrorType,
  isConnectionRefused,
  isDnsError,
  isNetworkUnreachable,
  isTimeout,
} from '../../../src/utils/network-errors';

function fetchFailure(code: string): TypeError {
  const cause = Object.assign(new Error(`connect ${code}`), { code });
  return new TypeError('fetch failed', { cause });
}

describe('network error classification', () => {
  it('should detect DNS failures from the fetch cause', () => {
    expect(isDnsError(fetchFailure('ENOTFOUND'))).toBe(true);
    expect(isDnsError(fetchFailure('EAI_AGAIN'))).toBe(true);
    expect(isDnsError(new Error('getaddrinfo ENOTFOUND inverter.local'))).toBe(true);
  });

  it('should detect refused connections', () => {
    expect(isConnectionRefused(fetchFailure('ECONNREFUSED'))).toBe(true);
    expect(isConnectionRefused(new Error('boom'))).toBe(false);
  });

  it('should treat aborted and timed-out requests as timeouts', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const aborted = new Error('This operation was aborted');
    aborted.name = 'AbortError';

    expect(isTimeout(timeout)).toBe(true);
    expect(isTimeout(aborted)).toBe(true);
    expect(isTimeout(fetchFailure('UND_ERR_CONNECT_TIMEOUT'))).toBe(true);
  });

  it('should detect an unreachable host', () => {
    expect(isNetworkUnreachable(fetchFailure('EHOSTUNREACH'))).toBe(true);
    expect(isNetworkUnreachable(fetchFailure('ENETUNREACH'))).toBe(true);
  });

  it('should ignore values that are not errors', () => {
    expect(isConnectionRefused('ECONNREFUSED')).toBe(false);
    expect(getNetworkErrorType(undefined)).toBe('UNKNOWN');
  });

  it('should name the error type', () => {
    expect(getNetworkErrorType(fetchFailure('ENOTFOUND'))).toBe('DNS_ERROR');
    expect(getNetworkErrorType(fetchFailure('ECONNREFUSED'))).toBe('CONNECTION_REFUSED');
    expect(getNetworkErrorType(fetchFailure('ETIMEDOUT'))).toBe('TIMEOUT');
    expect(getNetworkErrorType(fetchFailure('EHOSTUNREACH'))).toBe('NETWORK_UNREACHABLE');
    expect(getNetworkErrorType(new Error('bad gateway'))).toBe('UNKNOWN');
  });
});
