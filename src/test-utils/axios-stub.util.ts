import axios, {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export type StubReply = { status: number; data?: unknown } | Error;

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body?: string;
  headers: Record<string, unknown>;
}

/**
 * Axios instance whose adapter answers from `routes`, keyed by
 * "METHOD /path". An array reply is consumed one entry per request.
 */
export function createStubbedAxios(
  routes: Record<string, StubReply | StubReply[]>,
  defaults: { headers?: Record<string, string> } = {},
): { api: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter = async (
    config: InternalAxiosRequestConfig,
  ): Promise<AxiosResponse> => {
    const key = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
    requests.push({
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? config.data : undefined,
      headers: config.headers.toJSON(),
    });

    const route = routes[key];
    const reply = Array.isArray(route) ? route.shift() : route;
    if (!reply) {
      throw new AxiosError(`No stub for ${key}`, AxiosError.ERR_NETWORK, config);
    }
    if (reply instanceof Error) throw reply;

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) return response;
    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500
        ? AxiosError.ERR_BAD_RESPONSE
        : AxiosError.ERR_BAD_REQUEST,
      config,
      undefined,
      response,
    );
  };

  const api = axios.create({
    baseURL: 'https://api.test',
    headers: defaults.headers,
    adapter,
  });
  return { api, requests };
}
