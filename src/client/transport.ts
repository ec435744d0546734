import axios, { type AxiosInstance } from 'axios';

export interface HttpRequest {
  url: string;
  headers: Readonly<Record<string, string>>;
}

export interface HttpResponse {
  status: number;
}

// Performs one GET. Resolves for every status code; rejects only when no
// response arrived (timeout, connection reset, DNS failure).
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export interface AxiosTransportOptions {
  timeoutMs: number;
  instance?: AxiosInstance;
}

export const createAxiosTransport = (options: AxiosTransportOptions): HttpTransport => {
  const client = options.instance ?? axios.create();

  return async (request) => {
    const response = await client.get(request.url, {
      headers: { ...request.headers },
      timeout: options.timeoutMs,
      validateStatus: () => true, // Accept all status codes
      // Body is ignored; skip JSON parsing so its cost stays out of the timing
      responseType: 'text',
      transformResponse: [(data: unknown) => data]
    });

    return { status: response.status };
  };
};
