import process from 'node:process';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { config } from './config.js';
import { DefiLlamaApiError, ProtocolNotFoundError } from './errors.js';
import { runReport } from './services/research.service.js';
import { logInfoToStderr } from './logger.js';

const USAGE = 'Usage: protocol-scout <protocol> [--days N] [--json]';

export interface CliOptions {
  protocol: string;
  days: number;
  rawJson: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      days: { type: 'string', default: String(config.report.defaultDays) },
      json: { type: 'boolean', default: false },
    },
  });

  const protocol = positionals.join(' ').trim();
  if (!protocol) throw new Error(USAGE);

  const days = Number(values.days);
  if (!Number.isInteger(days) || days < 1 || days > config.report.maxDays) {
    throw new Error(`--days must be an integer between 1 and ${config.report.maxDays}`);
  }

  return { protocol, days, rawJson: values.json === true };
}

export async function main(argv: string[]): Promise<number> {
  logInfoToStderr();

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 2;
  }

  try {
    const report = await runReport(options.protocol, { days: options.days });
    process.stdout.write(`${JSON.stringify(report, null, options.rawJson ? undefined : 2)}\n`);
    return 0;
  } catch (err) {
    if (err instanceof ProtocolNotFoundError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    if (err instanceof DefiLlamaApiError) {
      console.error(`API Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
