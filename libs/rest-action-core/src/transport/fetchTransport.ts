import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * Transport backed by the global fetch API. Non-2xx statuses resolve
 * normally; only connectivity failures reject.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const response = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal,
  });
  const body = await response.arrayBuffer();

  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  return { status: response.status, headers, body };
};
