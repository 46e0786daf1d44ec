#!/usr/bin/env node
import { randomUUID } from 'crypto';
import { JobPoller, PollResult } from './client/jobPoller';
import { ScrapeApiClient } from './client/scrapeApi.client';
import { describeError, getErrorStatus, HttpError } from './errors/http-error';
import { loadClientConfig, loadEnv } from './utils/env';
import { logger } from './utils/logger';

const DEFAULT_URL_TO_SCRAPE = 'https://news.ycombinator.com/';

function report(result: PollResult, jobId: string, statusCommand: string, budgetMs: number) {
  console.log('\n--- Final Result ---');
  switch (result.outcome) {
    case 'terminal':
      console.log(JSON.stringify(result.record, null, 2));
      console.log(result.record.status === 'SUCCESS' ? '\nJob completed successfully.' : '\nJob failed.');
      break;
    case 'error_checking':
      console.log(`Job polling finished with status: ERROR_CHECKING (${result.error})`);
      break;
    case 'aborted':
      console.log(`Polling for job ${jobId} interrupted after ${result.attempts} attempt(s).`);
      break;
    case 'budget_exhausted':
      console.log(
        `Job ${jobId} did not reach a final state (SUCCESS/FAILED) within the polling time limit (${budgetMs / 1000} seconds).`,
      );
      console.log(`Last observed status: ${result.lastStatus ?? 'none'}`);
      console.log('It might still be running or encountered an issue. Check status manually later:');
      console.log(`  ${statusCommand}`);
      break;
  }
}

async function main(url: string) {
  loadEnv();
  const config = loadClientConfig();
  const client = new ScrapeApiClient({
    endpointUrl: config.endpointUrl,
    apiKey: config.apiKey,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const jobId = randomUUID();
  console.log(`Generated Job ID: ${jobId}`);
  console.log(`Submitting job ${jobId} for URL: ${url}...`);

  try {
    await client.submit(jobId, url);
  } catch (error) {
    console.error(`Error submitting job ${jobId}: ${describeError(error)}`);
    if (error instanceof HttpError) {
      console.error(`Response status: ${getErrorStatus(error)}`);
      console.error(`Response body: ${JSON.stringify(error.data)}`);
    }
    process.exitCode = 1;
    return;
  }
  console.log(`Job ${jobId} accepted.`);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  console.log(`\nPolling for job completion every ${config.pollIntervalMs / 1000} seconds...`);
  const poller = new JobPoller(client.asStatusQuery());
  const result = await poller.poll(jobId, {
    intervalMs: config.pollIntervalMs,
    maxAttempts: config.maxPollAttempts,
    signal: controller.signal,
    onAttempt: (attempt, observation) => {
      const status = observation.kind === 'found' ? observation.record.status : observation.kind;
      console.log(`Polling attempt ${attempt}/${config.maxPollAttempts}: ${status}`);
    },
  });

  report(result, jobId, client.statusCommand(jobId), config.pollIntervalMs * config.maxPollAttempts);
  if (result.outcome !== 'terminal' || result.record.status !== 'SUCCESS') {
    process.exitCode = 1;
  }
}

main(process.argv[2] ?? DEFAULT_URL_TO_SCRAPE).catch((error) => {
  logger.error('Quick start failed', { error: describeError(error) });
  process.exit(1);
});
