import https from 'https';
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { zone } from '../logging/zone';
import type { DataPlaneConfig } from '../types/config';
import { decodeCollection, decodeEntity, shapeForVersion } from './decoder';
import type { ApiVersion, JsonObject, ResponseShape } from './decoder';
import { ApiError, OperationCancelledError, TransportError } from './errors';
import type { Query } from './paths';

const log = zone('dataplane.transport');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type TransportSettings = Pick<DataPlaneConfig, 'url' | 'username' | 'password' | 'insecure' | 'apiVersion' | 'timeoutMs'>;

export type TransportOptions = {
    /** Replaces axios' HTTP adapter; tests answer requests in-process with it. */
    adapter?: AxiosAdapter;
};

export type RequestOptions = {
    body?: unknown;
    query?: Query;
    signal?: AbortSignal;
};

export type TransportResponse = {
    status: number;
    /** Parsed JSON body, or undefined when the body is empty or not JSON. */
    data: unknown;
    text: string;
};

export type ReadOptions = {
    query?: Query;
    signal?: AbortSignal;
    /** Statuses besides 404 that mean "nothing here yet". */
    emptyStatuses?: readonly number[];
};

export type WriteOptions = {
    query?: Query;
    signal?: AbortSignal;
};

export const CREATE_STATUSES: readonly number[] = [200, 201, 202];
export const UPDATE_STATUSES: readonly number[] = [200, 202];
export const DELETE_STATUSES: readonly number[] = [200, 202, 204];

function parseBody(text: string): unknown {
    if (text.trim() === '') return undefined;
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}

/**
 * One configured connection to a Data Plane API.
 *
 * Every status check happens here; the layers above only see decoded
 * payloads or typed errors.
 */
export class Transport {
    readonly apiVersion: ApiVersion;
    readonly shape: ResponseShape;
    private readonly http: AxiosInstance;

    constructor(settings: TransportSettings, options: TransportOptions = {}) {
        this.apiVersion = settings.apiVersion;
        this.shape = shapeForVersion(settings.apiVersion);
        this.http = axios.create({
            baseURL: `${settings.url.replace(/\/+$/, '')}/${settings.apiVersion}`,
            auth: { username: settings.username, password: settings.password },
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
            timeout: settings.timeoutMs,
            httpsAgent: new https.Agent({ rejectUnauthorized: !settings.insecure }),
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<TransportResponse> {
        const { body, query, signal } = options;
        if (signal?.aborted) throw new OperationCancelledError(signal.reason);

        log.debug({ message: `${method} ${path}`, data: { query, body } });

        let status: number;
        let text: string;
        try {
            const response = await this.http.request<unknown>({
                method,
                url: path,
                params: query,
                data: body,
                signal,
            });
            status = response.status;
            text = bodyText(response.data);
        } catch (err) {
            if (axios.isCancel(err) || signal?.aborted) {
                throw new OperationCancelledError(signal?.reason);
            }
            log.debug({ message: `${method} ${path} produced no response`, data: err });
            throw new TransportError(method, path, err);
        }

        log.debug({ message: `${method} ${path} -> ${status}`, data: text });
        return { status, data: parseBody(text), text };
    }

    expect(response: TransportResponse, allowed: readonly number[], method: HttpMethod, path: string): TransportResponse {
        if (allowed.includes(response.status)) return response;
        throw new ApiError({ status: response.status, method, path, body: response.text });
    }

    async readCollection(path: string, options: ReadOptions = {}): Promise<JsonObject[]> {
        const response = await this.request('GET', path, { query: options.query, signal: options.signal });
        if (response.status === 404 || options.emptyStatuses?.includes(response.status)) {
            return [];
        }
        this.expect(response, [200], 'GET', path);
        return decodeCollection(this.shape, response.data);
    }

    async readEntity(path: string, options: ReadOptions = {}): Promise<JsonObject | null> {
        const response = await this.request('GET', path, { query: options.query, signal: options.signal });
        if (response.status === 404) return null;
        this.expect(response, [200], 'GET', path);
        return decodeEntity(this.shape, response.data);
    }

    async create(path: string, body: unknown, options: WriteOptions = {}): Promise<TransportResponse> {
        const response = await this.request('POST', path, { ...options, body });
        return this.expect(response, CREATE_STATUSES, 'POST', path);
    }

    async update(path: string, body: unknown, options: WriteOptions = {}): Promise<TransportResponse> {
        const response = await this.request('PUT', path, { ...options, body });
        return this.expect(response, UPDATE_STATUSES, 'PUT', path);
    }

    async remove(path: string, options: WriteOptions = {}): Promise<TransportResponse> {
        const response = await this.request('DELETE', path, options);
        return this.expect(response, DELETE_STATUSES, 'DELETE', path);
    }
}
