import axios, {
    AxiosInstance,
    AxiosResponse,
    AxiosError,
} from 'axios';
import {
    LookupError,
    NetworkError,
    TimeoutError,
} from '../domain/errors';

export interface HttpClientOptions {
    baseURL?: string;
    timeoutMs: number;
    defaultHeaders?: Record<string, string>;
}

export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeoutMs?: number;
}

export interface HttpResponse {
    status: number;
    body: string;          // undecoded; callers decide whether it is JSON
    durationMs: number;
}

export class HttpClient {
    private client: AxiosInstance;
    private service: string;
    private defaultTimeoutMs: number;

    constructor(service: string, options: HttpClientOptions) {
        this.service = service;
        this.defaultTimeoutMs = options.timeoutMs;
        this.client = axios.create({
            baseURL: options.baseURL,
            timeout: options.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                ...options.defaultHeaders,
            },
            // every status is a response the caller wants to see, including 4xx/5xx bodies
            validateStatus: () => true,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
        });
    }

    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
        const start = Date.now();
        try {
            const response: AxiosResponse<unknown> = await this.client.get(url, {
                headers: options.headers,
                timeout: timeoutMs,
            });
            return this.wrapResponse(response, Date.now() - start);
        } catch (err) {
            throw this.handleError(err, timeoutMs);
        }
    }

    private wrapResponse(response: AxiosResponse<unknown>, durationMs: number): HttpResponse {
        const { data } = response;
        return {
            status: response.status,
            body: typeof data === 'string' ? data : data == null ? '' : JSON.stringify(data),
            durationMs,
        };
    }
    private handleError(err: unknown, timeoutMs: number): LookupError {
        if (!axios.isAxiosError(err)) {
            return new NetworkError(
                this.service,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }

        const axiosErr: AxiosError = err;
        if (axiosErr.code === 'ECONNABORTED' || axiosErr.code === 'ETIMEDOUT') {
            return new TimeoutError(this.service, timeoutMs);
        }
        return new NetworkError(
            this.service,
            `Network error: ${axiosErr.message}`,
            axiosErr,
        );
    }
}
