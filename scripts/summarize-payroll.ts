// scripts/summarize-payroll.ts
//
// npm run summarize -- --employee <uuid> [--start 2024-07-01 --end 2025-06-30] [--check-date]

import { parseArgs } from 'util';
import { describeSecret, loadEnvironment, readHrisConfig, type HrisConfig } from '@/lib/config';
import { parseIsoDateUtc } from '@/lib/date-helpers';
import { ConfigError } from '@/lib/errors';
import { createLogger, LogLevel, setLogLevel } from '@/lib/logger';
import { summarizeEmployeePayrollRuns } from '@/lib/payroll/summary';

const log = createLogger('cli');

const USAGE = `Usage: npm run summarize -- --employee <id> [options]

  --employee <id>         HRIS employee UUID (required)
  --start <YYYY-MM-DD>    current fiscal year start (default: Jan 1 this year)
  --end <YYYY-MM-DD>      current fiscal year end (default: Dec 31 this year)
  --region <US|EU|APAC>   API region (default: MERGE_REGION or US)
  --check-date            filter runs on check_date instead of server-side end dates
  --earnings-map <file>   code -> label mapping file (default: earnings_ukg.json)
  --category-map <file>   code -> category mapping file (default: earnings_to_aon.json)
  --debug                 verbose logging`;

function parseDateOption(name: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = parseIsoDateUtc(value);
  if (!date) throw new ConfigError(`--${name} must be a YYYY-MM-DD date, got "${value}"`);
  return date;
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      employee: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      region: { type: 'string' },
      'check-date': { type: 'boolean', default: false },
      'earnings-map': { type: 'string' },
      'category-map': { type: 'string' },
      debug: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.error(USAGE);
    return 0;
  }
  if (values.debug) setLogLevel(LogLevel.DEBUG);

  if (!values.employee) {
    log.error('--employee is required');
    console.error(USAGE);
    return 1;
  }

  const currentFyStart = parseDateOption('start', values.start);
  const currentFyEnd = parseDateOption('end', values.end);

  loadEnvironment();

  let config: HrisConfig;
  try {
    config = readHrisConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.error(err.message);
    log.error(`MERGE_API_KEY: ${describeSecret(process.env.MERGE_API_KEY)}`);
    log.error(`MERGE_ACCOUNT_TOKEN: ${describeSecret(process.env.MERGE_ACCOUNT_TOKEN)}`);
    return 1;
  }

  const result = await summarizeEmployeePayrollRuns({
    employeeId: values.employee,
    currentFyStart,
    currentFyEnd,
    region: values.region ?? config.region,
    useCheckDateFiltering: values['check-date'],
    earningsMapFile: values['earnings-map'],
    categoryMapFile: values['category-map'],
    credentials: { apiKey: config.apiKey, accountToken: config.accountToken },
  });

  console.log(JSON.stringify(result, null, 2));
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error('Payroll summary failed:', err);
    process.exitCode = 1;
  });
