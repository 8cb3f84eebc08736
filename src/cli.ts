#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { Command, InvalidArgumentError } from 'commander';
import { buildJobConfig, loadFieldMapping } from './config/JobConfigLoader.js';
import { JOB_DEFAULTS } from './config/defaults.js';
import { readBrowserEnvironment } from './config/env.js';
import { parseOutputFormat, saveRecords } from './output/OutputWriter.js';
import { runJob } from './scraper/JobRunner.js';
import { formatQualityReport } from './scraper/QualityReporter.js';
import { ConfigError } from './scraper/types/errors.js';

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

interface CliOptions {
  url: string;
  mapping: string;
  record: string;
  pagination: string;
  identity: string;
  max: number;
  wait: number;
  timeout: number;
  format: string;
  output: string;
  headful: boolean;
}

const program = new Command();

program
  .name('listing-scraper')
  .description('Scrape paginated, script-rendered listing pages into JSON or CSV')
  .version('0.1.0')
  .requiredOption('--url <url>', 'URL of the first listing page')
  .requiredOption('--mapping <file>', 'JSON file mapping field names to selector expressions')
  .requiredOption('--record <css>', 'CSS selector for one listing item')
  .option('--pagination <css>', 'CSS selector for the next page link', JOB_DEFAULTS.paginationSelector)
  .option('--identity <field>', 'Field that must be non-empty for a record to be kept', JOB_DEFAULTS.identityField)
  .option('--max <n>', 'Maximum number of records to scrape', parseNumber, JOB_DEFAULTS.maxRecords)
  .option('--wait <seconds>', 'Seconds to wait between page fetches', parseNumber, JOB_DEFAULTS.waitTimeSeconds)
  .option('--timeout <seconds>', 'Seconds allowed for one page capture', parseNumber, JOB_DEFAULTS.renderTimeoutSeconds)
  .option('--format <type>', 'Output format: json or csv', JOB_DEFAULTS.format)
  .option('--output <path>', 'Output file path without extension', JOB_DEFAULTS.output)
  .option('--headful', 'Show the browser window', false)
  .action(async (options: CliOptions) => {
    try {
      const format = parseOutputFormat(options.format);
      const fields = loadFieldMapping(options.mapping);
      const job = buildJobConfig(
        {
          targetUrl: options.url,
          recordSelector: options.record,
          paginationSelector: options.pagination,
          identityField: options.identity,
          maxRecords: options.max,
          waitTimeSeconds: options.wait,
          renderTimeoutSeconds: options.timeout,
        },
        fields
      );

      const browserEnv = readBrowserEnvironment();
      const result = await runJob(job, {
        session: {
          headless: options.headful ? false : browserEnv.headless,
          userAgent: browserEnv.userAgent,
          chromeChannel: browserEnv.chromeChannel,
        },
      });

      saveRecords(result.records, options.output, format);

      console.log('');
      for (const line of formatQualityReport(result.report)) {
        console.log(line);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`❌ ${error.message}`);
      } else {
        console.error('❌ Error:', error instanceof Error ? error.message : error);
      }
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
