import type { Logger } from '../logger/index.js';
import { createLogger } from '../logger/index.js';
import { ENV_REPOSITORY, loadFindOptions, loadLoggingConfig } from '../config/load.js';
import type { Repository } from '../repo/Repository.js';
import type { OutputWriter } from '../output/FindSink.js';
import { SqliteRepository } from '../store/sqlite/SqliteRepository.js';
import { runFind } from '../find/runFind.js';
import { ErrorCode } from '../types/enums.js';
import { ConfigError, FindError } from '../types/error.js';
import { HELP_TEXT, parseArgs } from './args.js';

export interface OpenedRepository {
  repository: Repository;
  close(): void;
}

export interface CliIo {
  stdout: OutputWriter;
  stderr: OutputWriter;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  logger?: Logger;
  openRepository?: (path: string) => OpenedRepository;
}

function openSqliteRepository(path: string): OpenedRepository {
  const repository = new SqliteRepository({ path, mustExist: true });
  return { repository, close: () => repository.close() };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Returns the process exit code.
export async function main(argv: readonly string[], io: CliIo): Promise<number> {
  let logger = io.logger;
  try {
    const cli = parseArgs(argv);
    if (cli.help) {
      io.stdout.write(HELP_TEXT);
      return 0;
    }

    const logging = {
      ...(cli.logLevel !== undefined && { level: cli.logLevel }),
      ...(cli.logPretty !== undefined && { pretty: cli.logPretty })
    };
    logger ??= createLogger(loadLoggingConfig(logging, io.env));
    const options = loadFindOptions(cli.find);
    const repoPath = cli.repo ?? io.env[ENV_REPOSITORY];
    if (!repoPath) {
      throw new ConfigError(
        ErrorCode.INVALID_OPTIONS,
        `please specify repository location (--repo or ${ENV_REPOSITORY})`
      );
    }

    const opened = (io.openRepository ?? openSqliteRepository)(repoPath);
    try {
      const summary = await runFind(options, {
        repository: opened.repository,
        stdout: io.stdout,
        logger,
        signal: io.signal
      });
      logger.info({ snapshots: summary.snapshots }, 'find finished');
    } finally {
      opened.close();
    }
    return 0;
  } catch (err) {
    logger?.debug(err instanceof FindError ? err.toJSON() : { err }, 'find failed');
    io.stderr.write(`Fatal: ${errorMessage(err)}\n`);
    return 1;
  }
}
