import { AxiosError } from 'axios';

/**
 * User-facing message for a failed backend request
 */
export function describeRequestError(err: unknown): string {
  if (err instanceof AxiosError) {
    const data: unknown = err.response?.data;
    if (
      typeof data === 'object' &&
      data !== null &&
      'message' in data &&
      typeof data.message === 'string' &&
      data.message
    ) {
      return data.message;
    } else if (err.response) {
      return `Server error (${err.response.status}): ${err.response.statusText}`;
    } else if (err.request) {
      return 'No response from server. Please check if the API server is running.';
    }
  }
  if (err instanceof Error) {
    return err.message || 'Unknown error occurred';
  }
  return 'An unknown error occurred';
}
