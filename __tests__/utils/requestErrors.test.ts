import { describe, expect, it } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { describeRequestError } from 'src/utils/requestErrors';

function response(status: number, statusText: string, data: unknown): AxiosResponse {
  return { data, status, statusText, headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('describeRequestError', () => {
  it('prefers the message sent by the server', () => {
    const res = response(400, 'Bad Request', { message: 'Unknown region' });
    const err = new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, {}, res);
    expect(describeRequestError(err)).toBe('Unknown region');
  });

  it('describes server errors without a message', () => {
    const res = response(503, 'Service Unavailable', '');
    const err = new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, {}, res);
    expect(describeRequestError(err)).toBe('Server error (503): Service Unavailable');
  });

  it('describes requests that got no response', () => {
    const err = new AxiosError('Network Error', 'ERR_NETWORK', undefined, {});
    expect(describeRequestError(err)).toBe(
      'No response from server. Please check if the API server is running.',
    );
  });

  it('falls back to the error message', () => {
    expect(describeRequestError(new Error('boom'))).toBe('boom');
    expect(describeRequestError(new Error(''))).toBe('Unknown error occurred');
    expect(describeRequestError('boom')).toBe('An unknown error occurred');
  });
});
