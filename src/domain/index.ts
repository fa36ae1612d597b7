export type {
    JsonPrimitive,
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
} from './models';

export {
    lookupRequestSchema,
    jsonValueSchema,
    validateLookupRequest,
    MIN_TIMEOUT_SECONDS,
    MAX_TIMEOUT_SECONDS,
} from './schemas';
export type { LookupRequestInput } from './schemas';

export {
    LookupError,
    EmptyIdentifierError,
    ValidationError,
    MissingCredentialError,
    NetworkError,
    TimeoutError,
    ApiError,
    FlattenError,
} from './errors';
export type { ErrorCode } from './errors';
