import { ErrorCode } from '../types/enums.js';
import { ConfigError } from '../types/error.js';
import type { FindOptionsInput } from '../config/schema.js';

export interface CliOptions {
  find: FindOptionsInput;
  repo?: string;
  logLevel?: string;
  logPretty?: boolean;
  help: boolean;
}

type ValueFlag = 'repo' | 'oldest' | 'newest' | 'snapshot' | 'host' | 'tag' | 'path' | 'log-level';
type BooleanFlag = 'ignore-case' | 'long' | 'json' | 'no-lock' | 'quiet' | 'log-pretty' | 'help';

const SHORT_FLAGS: Record<string, ValueFlag | BooleanFlag> = {
  O: 'oldest',
  N: 'newest',
  s: 'snapshot',
  H: 'host',
  i: 'ignore-case',
  l: 'long',
  q: 'quiet',
  h: 'help'
};

const VALUE_FLAGS = new Set<string>(['repo', 'oldest', 'newest', 'snapshot', 'host', 'tag', 'path', 'log-level']);
const BOOLEAN_FLAGS = new Set<string>(['ignore-case', 'long', 'json', 'no-lock', 'quiet', 'log-pretty', 'help']);

export const HELP_TEXT = `snapfind - find files and directories in snapshots

Usage:
  snapfind [flags] PATTERN

Flags:
      --repo <path>        repository to search (default: $SNAPFIND_REPOSITORY)
  -O, --oldest <time>      oldest modification date/time
  -N, --newest <time>      newest modification date/time
  -s, --snapshot <id>      snapshot id to search in (can be given multiple times, "latest" allowed)
  -i, --ignore-case        ignore case for pattern
  -l, --long               use a long listing format showing size and mode
  -H, --host <host>        only consider snapshots for this host, when no snapshot id is given
      --tag <tag[,tag]>    only consider snapshots which include this tag, when no snapshot id is given
      --path <path>        only consider snapshots which include this (absolute) path, when no snapshot id is given
      --json               print results as a JSON document
      --no-lock            do not lock the repository
  -q, --quiet              do not print snapshot headers
      --log-level <level>  fatal, error, warn, info, debug, trace or silent (default: $SNAPFIND_LOG_LEVEL or warn)
      --log-pretty         human-readable log lines on stderr (default: $SNAPFIND_LOG_PRETTY)
  -h, --help               show this help message

PATTERN is a shell glob matched against entry names: * ? [abc] [a-z] [^abc], \\ quotes.
`;

function unknownOption(arg: string): ConfigError {
  return new ConfigError(ErrorCode.INVALID_ARGUMENTS, `unknown option: ${arg}`, { option: arg });
}

function missingValue(flag: string): ConfigError {
  return new ConfigError(ErrorCode.INVALID_ARGUMENTS, `--${flag} requires a value`, { option: flag });
}

export function parseArgs(args: readonly string[]): CliOptions {
  const positional: string[] = [];
  const snapshotIds: string[] = [];
  const tags: string[] = [];
  const paths: string[] = [];
  const cli: CliOptions = { find: {}, help: false };
  const find = cli.find;

  const applyValue = (flag: ValueFlag, value: string) => {
    switch (flag) {
      case 'repo':
        cli.repo = value;
        break;
      case 'log-level':
        cli.logLevel = value;
        break;
      case 'oldest':
        find.oldest = value;
        break;
      case 'newest':
        find.newest = value;
        break;
      case 'snapshot':
        snapshotIds.push(value);
        break;
      case 'host':
        find.host = value;
        break;
      case 'tag':
        tags.push(value);
        break;
      case 'path':
        paths.push(value);
        break;
    }
  };

  const applyBoolean = (flag: BooleanFlag) => {
    switch (flag) {
      case 'ignore-case':
        find.ignoreCase = true;
        break;
      case 'long':
        find.long = true;
        break;
      case 'json':
        find.json = true;
        break;
      case 'no-lock':
        find.noLock = true;
        break;
      case 'quiet':
        find.quiet = true;
        break;
      case 'log-pretty':
        cli.logPretty = true;
        break;
      case 'help':
        cli.help = true;
        break;
    }
  };

  const isValueFlag = (flag: string): flag is ValueFlag => VALUE_FLAGS.has(flag);
  const isBooleanFlag = (flag: string): flag is BooleanFlag => BOOLEAN_FLAGS.has(flag);

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (isValueFlag(flag)) {
        if (eq !== -1) {
          applyValue(flag, arg.slice(eq + 1));
          i += 1;
        } else {
          if (i + 1 >= args.length) throw missingValue(flag);
          applyValue(flag, args[i + 1]);
          i += 2;
        }
        continue;
      }
      if (isBooleanFlag(flag) && eq === -1) {
        applyBoolean(flag);
        i += 1;
        continue;
      }
      throw unknownOption(arg);
    }

    if (arg.startsWith('-') && arg.length > 1) {
      // Combined short flags like -il; a value flag takes the rest of the word or the next argument.
      let consumedNext = false;
      for (let j = 1; j < arg.length; j += 1) {
        const flag = SHORT_FLAGS[arg[j]];
        if (flag === undefined) throw unknownOption(`-${arg[j]}`);
        if (isValueFlag(flag)) {
          const rest = arg.slice(j + 1);
          if (rest.length > 0) {
            applyValue(flag, rest);
          } else {
            if (i + 1 >= args.length) throw missingValue(flag);
            applyValue(flag, args[i + 1]);
            consumedNext = true;
          }
          break;
        }
        if (isBooleanFlag(flag)) applyBoolean(flag);
      }
      i += consumedNext ? 2 : 1;
      continue;
    }

    positional.push(arg);
    i += 1;
  }

  find.args = positional;
  find.snapshotIds = snapshotIds;
  find.tags = tags;
  find.paths = paths;
  return cli;
}
