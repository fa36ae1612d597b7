import { z } from 'zod';
import { JsonValue } from './models';

export const MIN_TIMEOUT_SECONDS = 5;
export const MAX_TIMEOUT_SECONDS = 120;

export const lookupRequestSchema = z.object({
    identifier: z.string()
        .trim()
        .min(1, 'unique_id is required'),
    expandOrder: z.boolean().default(true),
    timeoutSeconds: z.number()
        .int('Timeout must be a whole number of seconds')
        .min(MIN_TIMEOUT_SECONDS, `Timeout must be at least ${MIN_TIMEOUT_SECONDS} seconds`)
        .max(MAX_TIMEOUT_SECONDS, `Timeout cannot exceed ${MAX_TIMEOUT_SECONDS} seconds`)
        .optional(),    // unset: the client's configured REQUEST_TIMEOUT_MS applies
    authToken: z.string().trim().optional(),
});

export type LookupRequestInput = z.input<typeof lookupRequestSchema>;

export function validateLookupRequest(input: unknown) {
    return lookupRequestSchema.parse(input);
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema),
    ]),
);
