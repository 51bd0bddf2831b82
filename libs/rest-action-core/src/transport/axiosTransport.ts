import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/** The subset of an axios instance this transport calls. */
export interface AxiosInstanceLike {
  request<T = unknown>(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: T;
  }>;
}

/**
 * Wraps an axios instance as an HttpTransport. Every status resolves so
 * that 401 and 429 reach the endpoint's response classification.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request<ArrayBuffer>({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    return { status: response.status, headers, body: response.data };
  };
};
