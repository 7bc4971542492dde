import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
    status?: number;
    data: unknown;
}

export type StubRoutes = Record<string, (config: InternalAxiosRequestConfig) => StubResponse>;

/**
 * In-process axios adapter. Routes are keyed by `METHOD url` with the url as
 * the client passed it (before the base URL is applied). Non-2xx statuses
 * reject the way axios' own adapters do.
 */
export function stubAdapter(routes: StubRoutes): { adapter: AxiosAdapter; requests: InternalAxiosRequestConfig[] } {
    const requests: InternalAxiosRequestConfig[] = [];

    const adapter: AxiosAdapter = async config => {
        requests.push(config);
        const key = `${(config.method || 'get').toUpperCase()} ${config.url}`;
        const route = routes[key];
        const stub = route ? route(config) : { status: 404, data: { message: `no route for ${key}` } };
        const status = stub.status ?? 200;

        const response: AxiosResponse = {
            data: stub.data,
            status,
            statusText: String(status),
            headers: {},
            config,
        };
        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, response);
        }
        return response;
    };

    return { adapter, requests };
}

export function jsonBody(config: InternalAxiosRequestConfig): unknown {
    return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}
