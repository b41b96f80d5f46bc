import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';

/**
 * Minimal successful axios response for stubbing client.post
 */
export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
