import { buildHeaders, buildQuery } from '../../src/shipstream/request';
import { DEFAULT_API_BASE } from '../../src/config';
import { TEST_SHIPSTREAM_CONFIG } from '../helpers';

describe('Request builder', () => {

    describe('buildQuery', () => {
        it('should filter by unique_id and expand the order', () => {
            const url = buildQuery('5900008555', true);

            expect(url).toBe(`${DEFAULT_API_BASE}?filter[]=unique_id:5900008555&expand=order`);
            expect(url.split('unique_id:5900008555')).toHaveLength(2);   // exactly one occurrence
            expect(url.endsWith('expand=order')).toBe(true);
        });

        it('should omit the expand parameter when not requested', () => {
            const url = buildQuery('5900008555', false);

            expect(url).toBe(`${DEFAULT_API_BASE}?filter[]=unique_id:5900008555`);
            expect(url).not.toContain('expand');
        });

        it('should trim whitespace around the identifier', () => {
            const url = buildQuery('  5900008555 \n', true);

            expect(url).toBe(`${DEFAULT_API_BASE}?filter[]=unique_id:5900008555&expand=order`);
        });

        it('should keep brackets and colon unencoded', () => {
            const url = buildQuery('ABC-1', false, TEST_SHIPSTREAM_CONFIG.baseUrl);

            expect(url).toBe('https://shipstream.example.test/api/global/beta/shipments/?filter[]=unique_id:ABC-1');
        });
    });

    describe('buildHeaders', () => {
        it('should produce the fixed header set with a trimmed token', () => {
            expect(buildHeaders('  test-token  ')).toEqual({
                'Content-Type': 'application/json',
                'X-ShipStream-API-Version': '2020-10',
                'X-AutomationV1-Auth': 'test-token',
            });
        });

        it('should use a configured API version', () => {
            const headers = buildHeaders('test-token', '2024-01');

            expect(headers['X-ShipStream-API-Version']).toBe('2024-01');
        });
    });
});
