export type {
    JsonValue,
    JsonObject,
    ParsedBody,
    ShipmentRecord,
    OrderRecord,
    MerchantRecord,
    Row,
    SummarySections,
    FlatCell,
    FlatTable,
    CsvExport,
    LookupRequest,
    LookupReport,
} from './domain/models';
export { validateLookupRequest } from './domain/schemas';
export {
    LookupError,
    EmptyIdentifierError,
    ValidationError,
    MissingCredentialError,
    NetworkError,
    TimeoutError,
    ApiError,
    FlattenError,
} from './domain/errors';
export type { ShipmentApi, ShipmentApiResponse, ShipmentQueryOptions } from './shipstream/types';
export { ShipStreamClient } from './shipstream/client';
export { buildQuery, buildHeaders } from './shipstream/request';
export {
    parseBody,
    firstShipment,
    relatedOrder,
    relatedMerchant,
} from './shipstream/extractor';
export {
    formatWeight,
    countOf,
    shipmentRows,
    orderRows,
    merchantRows,
    buildSummary,
} from './report/formatter';
export { flatten, toCsv, csvFileName } from './report/flatten';
export { renderReport } from './report/render';
export { ShipmentLookupService } from './services/lookup.service';
export { loadConfig, resolveAuthToken } from './config';
export type { AppConfig, ShipStreamConfig } from './config';
