#!/usr/bin/env node
import { parseArgs, USAGE } from './cliArgs';
import { loadRuntimeConfig } from './config/config';
import { ExtractionConfigService } from './config/ExtractionConfigService';
import { NdjsonRecordWriter } from './CommentExport/RecordWriter';
import { AuditService } from './core/utils/AuditService';
import { ConfigurationError, JiraConnectionError } from './core/utils/errors';
import { FileLoader } from './core/utils/FileLoader';
import { ConsoleLogger } from './core/utils/Logger';
import CommentHistoryManager from './ExtractionManager/CommentHistoryManager';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

async function main(argv: string[]): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === 'error') {
    console.error(`${parsed.message}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }
  const { configFile, stanza } = parsed.options;

  let logger = new ConsoleLogger('jirasync');
  let jql: string | null = null;
  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const runtime = loadRuntimeConfig();
    logger = new ConsoleLogger('jirasync', runtime.LOG_LEVEL);
    logger.info(`Executing jira comment export with config_file="${configFile}" stanza="${stanza}"`);

    const loader = new FileLoader(undefined, AuditService.fromSettings(runtime));
    const source = await new ExtractionConfigService(loader).loadStanza(configFile, stanza);
    jql = source.jql;

    const manager = await CommentHistoryManager.fromConfig(runtime, source, logger);
    const summary = await manager.process(source.jql, new NdjsonRecordWriter(process.stdout), controller.signal);
    logger.info(`Exported ${summary.records} comments from ${summary.issues} issues in ${(summary.elapsedMs / 1000).toFixed(1)}s`);
    logger.info('Execution successful');
    return EXIT_OK;
  } catch (err) {
    if (controller.signal.aborted) {
      logger.info('Interrupted');
      return EXIT_INTERRUPTED;
    }
    if (err instanceof ConfigurationError) {
      logger.error(`Invalid configuration provided: ${err.message}`);
    } else if (err instanceof JiraConnectionError) {
      logger.error(`Connection to jira server failed: ${err.message}`);
    } else {
      logger.error(`Uncaught Exception raised. ${err instanceof Error ? err.message : String(err)}`, err);
    }
    return EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onSigint);
    logger.info(`Executed JQL: ${jql ?? '(none)'}`);
    logger.info('Exiting');
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = EXIT_FAILURE;
  },
);
