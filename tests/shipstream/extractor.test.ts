import {
    firstShipment,
    isJsonObject,
    parseBody,
    payloadOf,
    relatedMerchant,
    relatedOrder,
} from '../../src/shipstream/extractor';

describe('Response extractor', () => {

    describe('parseBody', () => {
        it('should decode valid JSON bytes', () => {
            const body = parseBody(Buffer.from('{"a":[1,2,{"b":null}],"c":"x"}'));

            expect(body).toEqual({
                kind: 'json',
                value: { a: [1, 2, { b: null }], c: 'x' },
                text: '{"a":[1,2,{"b":null}],"c":"x"}',
            });
        });

        it('should return non-JSON text unchanged', () => {
            const html = '<html><body>502 Bad Gateway</body></html>';

            expect(parseBody(html)).toEqual({ kind: 'text', text: html });
            expect(parseBody(Buffer.from(html))).toEqual({ kind: 'text', text: html });
        });

        it('should keep the exact text of a body whose numbers lose precision when decoded', () => {
            const raw = '{"id":9007199254740993}';

            const body = parseBody(raw);

            expect(body.kind).toBe('json');
            expect(body.text).toBe(raw);
        });

        it('should treat an empty body as text', () => {
            expect(parseBody('')).toEqual({ kind: 'text', text: '' });
        });

        it('should keep a JSON string literal distinct from raw text', () => {
            expect(parseBody('"hello"')).toEqual({ kind: 'json', value: 'hello', text: '"hello"' });
        });
    });

    describe('payloadOf', () => {
        it('should unwrap json and text bodies', () => {
            expect(payloadOf({ kind: 'json', value: [1], text: '[1]' })).toEqual([1]);
            expect(payloadOf({ kind: 'text', text: 'Service Unavailable' })).toBe('Service Unavailable');
        });
    });

    describe('isJsonObject', () => {
        it('should accept only plain mappings', () => {
            expect(isJsonObject({ a: 1 })).toBe(true);
            expect(isJsonObject([])).toBe(false);
            expect(isJsonObject(null)).toBe(false);
            expect(isJsonObject('x')).toBe(false);
            expect(isJsonObject(undefined)).toBe(false);
        });
    });

    describe('firstShipment', () => {
        it('should return the first record of the collection', () => {
            expect(firstShipment({ collection: [{ id: 1 }, { id: 2 }] })).toEqual({ id: 1 });
        });

        it('should return undefined for an empty collection', () => {
            expect(firstShipment({ collection: [] })).toBeUndefined();
        });

        it('should return undefined when collection is not a list', () => {
            expect(firstShipment({ collection: 'oops' })).toBeUndefined();
            expect(firstShipment({ collection: { id: 1 } })).toBeUndefined();
        });

        it('should return undefined when the first element is not a mapping', () => {
            expect(firstShipment({ collection: [42, { id: 1 }] })).toBeUndefined();
        });

        it('should return undefined for non-mapping payloads', () => {
            expect(firstShipment([1, 2])).toBeUndefined();
            expect(firstShipment('not json')).toBeUndefined();
            expect(firstShipment(null)).toBeUndefined();
            expect(firstShipment(undefined)).toBeUndefined();
        });
    });

    describe('relatedOrder / relatedMerchant', () => {
        it('should return nested mappings', () => {
            const order = relatedOrder({ id: 1, order: { id: 9, merchant: { type: 'retail' } } });

            expect(order).toEqual({ id: 9, merchant: { type: 'retail' } });
            expect(relatedMerchant(order)).toEqual({ type: 'retail' });
        });

        it('should return undefined for missing or non-mapping values', () => {
            expect(relatedOrder({ id: 1 })).toBeUndefined();
            expect(relatedOrder({ order: 9 })).toBeUndefined();
            expect(relatedOrder(undefined)).toBeUndefined();
            expect(relatedMerchant({ merchant: ['retail'] })).toBeUndefined();
            expect(relatedMerchant(undefined)).toBeUndefined();
        });
    });
});
