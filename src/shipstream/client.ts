import { ShipmentApi, ShipmentApiResponse, ShipmentQueryOptions } from './types';
import { HttpClient } from '../http/client';
import { ShipStreamConfig } from '../config';
import { buildHeaders, buildQuery } from './request';

export class ShipStreamClient implements ShipmentApi {
    readonly name = 'shipstream';

    private httpClient: HttpClient;
    private baseUrl: string;
    private apiVersion: string;

    constructor(config: Pick<ShipStreamConfig, 'baseUrl' | 'apiVersion'>, timeoutMs: number) {
        this.baseUrl = config.baseUrl;
        this.apiVersion = config.apiVersion;
        this.httpClient = new HttpClient(this.name, { timeoutMs });
    }

    async getShipments(uniqueId: string, options: ShipmentQueryOptions): Promise<ShipmentApiResponse> {
        const url = buildQuery(uniqueId, options.expandOrder, this.baseUrl);
        const response = await this.httpClient.get(url, {
            headers: buildHeaders(options.authToken, this.apiVersion),
            timeoutMs: options.timeoutMs,
        });
        return { url, ...response };
    }
}
