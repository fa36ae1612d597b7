#!/usr/bin/env node
import { writeFile } from 'fs/promises';
import path from 'path';
import { loadConfig, AppConfig } from './config';
import { ShipStreamClient } from './shipstream/client';
import { ShipmentLookupService } from './services/lookup.service';
import { renderReport } from './report/render';
import { parseCliArgs } from './flags';
import { LookupError } from './domain/errors';

const USAGE = `Usage: shipment-lookup <unique_id> [flags]

  --no-expand          do not inline the order (omit expand=order)
  --timeout <seconds>  request timeout, 5-120 (default: REQUEST_TIMEOUT_MS, 30000 ms)
  --token <token>      auth token; overrides SHIPSTREAM_AUTH_TOKEN
  --csv                write the flattened table to shipment_<unique_id>.csv
  --out-dir <dir>      directory for the CSV file (default: current directory)
  -h, --help           show this help`;

async function main(): Promise<number> {
    const options = parseCliArgs(process.argv.slice(2), process.cwd());
    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        console.error('[cli] Config error:', err instanceof Error ? err.message : err);
        console.log('\nHint: copy .env.example to .env and fill in your ShipStream token.\n');
        return 1;
    }

    const api = new ShipStreamClient(config.shipstream, config.requestTimeoutMs);
    const service = new ShipmentLookupService({
        api,
        defaultAuthToken: config.shipstream.authToken,
    });

    try {
        const request = service.validate(options.request);
        console.log(`Querying ${api.name} for unique_id ${request.identifier}...`);
        const report = await service.lookup(request);
        console.log(renderReport(report));

        if (options.writeCsv && report.csv) {
            const target = path.join(options.outDir, report.csv.fileName);
            await writeFile(target, report.csv.content, 'utf8');
            console.log(`\nCSV written to ${target}`);
        }
        return report.error ? 1 : 0;
    } catch (err) {
        if (err instanceof LookupError) {
            console.error(`[cli] Error: ${err.message}`);
            if (err.details) {
                console.error(JSON.stringify(err.toJSON(), null, 2));
            }
            return 1;
        }
        throw err;
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        console.error('[cli] Unexpected error:', err);
        process.exitCode = 1;
    });
