import { ZodError } from 'zod';
import {
    ApiError,
    EmptyIdentifierError,
    FlattenError,
    LookupReport,
    LookupRequest,
    MissingCredentialError,
    ValidationError,
} from '../domain';
import { validateLookupRequest } from '../domain/schemas';
import { resolveAuthToken } from '../config';
import { ShipmentApi } from '../shipstream/types';
import { firstShipment, parseBody, payloadOf } from '../shipstream/extractor';
import { buildSummary } from '../report/formatter';
import { csvFileName, flatten, toCsv } from '../report/flatten';

export const NO_SHIPMENT_WARNING = "No shipment found in 'collection'.";

interface LookupServiceDeps {
    api: ShipmentApi;
    defaultAuthToken?: string;    // configured secret; an explicit request token overrides it
}

export class ShipmentLookupService {
    private api: ShipmentApi;
    private defaultAuthToken: string;

    constructor(deps: LookupServiceDeps) {
        this.api = deps.api;
        this.defaultAuthToken = deps.defaultAuthToken ?? '';
    }

    /**
     * Runs one lookup. Input, credential and transport failures throw a LookupError before
     * anything is rendered; any HTTP response, including 4xx/5xx, comes back as a report.
     */
    async lookup(rawRequest: unknown): Promise<LookupReport> {
        const request = this.validate(rawRequest);

        const authToken = resolveAuthToken(request.authToken, this.defaultAuthToken);
        if (!authToken) {
            throw new MissingCredentialError(this.api.name);
        }

        const response = await this.api.getShipments(request.identifier, {
            expandOrder: request.expandOrder,
            authToken,
            ...(request.timeoutSeconds !== undefined ? { timeoutMs: request.timeoutSeconds * 1000 } : {}),
        });

        const body = parseBody(response.body);
        const report: LookupReport = {
            identifier: request.identifier,
            url: response.url,
            statusCode: response.status,
            durationMs: response.durationMs,
            body,
            warnings: [],
        };

        if (response.status >= 400) {
            report.error = new ApiError(this.api.name, response.status, body.text);
            console.warn(`[lookup] ${report.error.message} for unique_id ${request.identifier}`);
            return report;
        }

        const payload = payloadOf(body);
        const shipment = firstShipment(payload);
        if (shipment) {
            report.summary = buildSummary(shipment);
        } else {
            report.warnings.push(NO_SHIPMENT_WARNING);
        }

        try {
            report.table = flatten(payload);
            report.csv = {
                fileName: csvFileName(request.identifier),
                content: toCsv(report.table),
            };
        } catch (err) {
            if (!(err instanceof FlattenError)) throw err;
            console.warn('[lookup] Could not flatten response:', err.message);
            report.warnings.push(`Could not flatten the response into a table: ${err.message}`);
        }

        return report;
    }

    /** Throws EmptyIdentifierError or ValidationError; lookup() runs it again, so callers may skip it. */
    validate(rawRequest: unknown): LookupRequest {
        try {
            return validateLookupRequest(rawRequest);
        } catch (err) {
            if (err instanceof ZodError) {
                if (err.issues.some(issue => issue.path[0] === 'identifier')) {
                    throw new EmptyIdentifierError();
                }
                throw new ValidationError(
                    'Invalid lookup request',
                    {
                        issues: err.issues.map(issue => ({
                            field: issue.path.join('.'),
                            message: issue.message,
                        })),
                    },
                );
            }
            throw err;
        }
    }
}
