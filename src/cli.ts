// Command-line runner: config -> auth -> digest -> console report
import { parseArgs } from 'node:util';
import type { OAuth2Client } from 'google-auth-library';
import type { gmail_v1 } from 'googleapis';
import { loadConfig, validateConfig, type Config } from './lib/config.js';
import { ConfigurationError, describeError } from './lib/errors.js';
import { getAuthenticatedClient, type AuthOptions } from './services/gmail/auth.js';
import { GmailClient } from './services/gmail/client.js';
import { messageParser } from './services/gmail/message-parser.js';
import { LlmSummarizer } from './services/summarization/engine.js';
import type { IMailStore, ITextSummarizer } from './shared/types/api.js';
import { runInboxDigest } from './workflows/inbox-digest.js';
import {
  COMPLETE_MESSAGE,
  printLines,
  renderBanner,
  renderListed,
  renderOutcome,
  renderStep,
} from './ui/report.js';

export interface CliOverrides {
  maxEmails?: number;
  query?: string;
  summaryWords?: number;
  model?: string;
}

function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        max: { type: 'string' },
        query: { type: 'string' },
        words: { type: 'string' },
        model: { type: 'string' },
      },
      strict: true,
    }).values;
  } catch (error) {
    throw new ConfigurationError(describeError(error), { cause: error });
  }
}

export function parseCliArgs(argv: string[]): CliOverrides {
  const values = parseFlags(argv);

  return {
    maxEmails: parsePositiveInt('max', values.max),
    query: values.query,
    summaryWords: parsePositiveInt('words', values.words),
    model: values.model,
  };
}

export function applyOverrides(config: Config, overrides: CliOverrides): Config {
  return {
    ...config,
    llm: { ...config.llm, model: overrides.model ?? config.llm.model },
    digest: {
      maxEmails: overrides.maxEmails ?? config.digest.maxEmails,
      query: overrides.query ?? config.digest.query,
      summaryWords: overrides.summaryWords ?? config.digest.summaryWords,
    },
  };
}

export interface CliDependencies {
  loadConfig: () => Config;
  authenticate: (options: AuthOptions) => Promise<OAuth2Client>;
  createStore: (auth: OAuth2Client) => IMailStore<gmail_v1.Schema$Message>;
  createSummarizer: (config: Config) => ITextSummarizer;
}

const defaultDependencies: CliDependencies = {
  loadConfig: () => loadConfig(),
  authenticate: getAuthenticatedClient,
  createStore: (auth) => new GmailClient(auth),
  createSummarizer: (config) =>
    new LlmSummarizer({ model: config.llm.model, apiKey: config.llm.apiKey }),
};

/**
 * Run one digest. Resolves to the process exit code; fatal errors are
 * reported here rather than thrown.
 */
export async function runCli(
  argv: string[],
  deps: CliDependencies = defaultDependencies
): Promise<number> {
  printLines(renderBanner());

  try {
    const config = applyOverrides(deps.loadConfig(), parseCliArgs(argv));
    for (const warning of validateConfig(config)) {
      console.warn(`Warning: ${warning}`);
    }

    console.log(`\n${renderStep(1, 3, 'Connecting to Gmail...')}`);
    const auth = await deps.authenticate({
      credentialsPath: config.gmail.credentialsPath,
      tokenPath: config.gmail.tokenPath,
      interactive: Boolean(process.stdin.isTTY),
    });
    const store = deps.createStore(auth);

    console.log(renderStep(2, 3, 'Initializing AI summarizer...'));
    const summarizer = deps.createSummarizer(config);

    console.log(renderStep(3, 3, `Fetching last ${config.digest.maxEmails} emails...`));
    const report = await runInboxDigest({
      store,
      parser: messageParser,
      summarizer,
      query: config.digest.query,
      maxEmails: config.digest.maxEmails,
      wordBudget: config.digest.summaryWords,
      onListed: (total) => printLines(renderListed(total)),
      onOutcome: (outcome, index, total) => printLines(renderOutcome(outcome, index, total)),
    });

    if (report.listed > 0) {
      console.log(`\n${COMPLETE_MESSAGE}`);
    }
    return 0;
  } catch (error) {
    console.error(`\n✗ Error: ${describeError(error)}`);
    return 1;
  }
}
