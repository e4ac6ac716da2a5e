#!/usr/bin/env node
import { select } from '@inquirer/prompts';
import { z } from 'zod';

import type { FileSystemPort } from './application/ports/file-system.port';
import { describeEntries, formatEntryLine } from './application/services/entry-report';
import type { EntryLine } from './application/services/entry-report';
import { ENTRY_KIND } from './domain/entry-kind';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { getLogger } from './utils/get-logger';

const COMMAND_SCHEMA = z.enum(['ls', 'cat', 'modkey', 'explore', 'help']);

type Command = z.infer<typeof COMMAND_SCHEMA>;

type ParsedArgs = {
  command: string | null;
  positional: string[];
};

type ExploreChoice =
  | { action: 'parent' }
  | { action: 'exit' }
  | { action: 'open'; line: EntryLine };

type PromptChoice<Value> = {
  name: string;
  value: Value;
};

const operationChoices: Array<PromptChoice<Command>> = [
  { name: 'Explore - Browse directories starting at the working directory', value: 'explore' },
  { name: 'List - Show the entries of the working directory', value: 'ls' },
  { name: 'Help - Show usage information', value: 'help' },
];

const logger = getLogger();

const main = async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileSystem = new NodeFileSystem({ logger });

  if (process.stdin.isTTY && !args.command) {
    const operation = await select({
      message: 'What would you like to do?',
      choices: operationChoices,
    });
    await runCommand(fileSystem, operation, []);
    return;
  }

  const command = COMMAND_SCHEMA.safeParse(args.command ?? 'help');
  if (!command.success) {
    logger.error({ command: args.command }, 'Unknown command');
    printHelp();
    process.exitCode = 1;
    return;
  }

  await runCommand(fileSystem, command.data, args.positional);
};

const runCommand = async (fileSystem: FileSystemPort, command: Command, positional: string[]) => {
  const [target] = positional;

  switch (command) {
    case 'ls':
      await runList(fileSystem, resolveDirectory(fileSystem, target));
      return;
    case 'explore':
      await runExplore(fileSystem, resolveDirectory(fileSystem, target));
      return;
    case 'cat':
    case 'modkey':
      if (!target) {
        logger.error({ command }, 'Missing file argument');
        process.exitCode = 1;
        return;
      }
      if (command === 'cat') {
        process.stdout.write(await fileSystem.readFile(target));
      } else {
        process.stdout.write(`${await fileSystem.modKey(target)}\n`);
      }
      return;
    case 'help':
      printHelp();
      return;
  }
};

const resolveDirectory = (fileSystem: FileSystemPort, target?: string): string => {
  if (target) {
    return fileSystem.abs(target) ?? target;
  }
  return fileSystem.cwd() || '.';
};

const runList = async (fileSystem: FileSystemPort, dir: string) => {
  const listing = await fileSystem.readDirectory(dir);
  if (listing.error) {
    logger.error({ dir, code: listing.error.code, kind: listing.error.kind }, 'Cannot list directory');
    process.exitCode = 1;
    return;
  }

  const lines = await describeEntries(listing.entries);
  const body = lines.map(formatEntryLine).join('\n');
  process.stdout.write(`${dir} (${lines.length} entries)\n${body}${body ? '\n' : ''}`);
};

const runExplore = async (fileSystem: FileSystemPort, start: string) => {
  let current = start;

  while (true) {
    const listing = await fileSystem.readDirectory(current);
    if (listing.error) {
      logger.error({ dir: current, code: listing.error.code }, 'Cannot list directory');
      return;
    }

    const lines = await describeEntries(listing.entries);
    const choices: Array<PromptChoice<ExploreChoice>> = [
      { name: '..', value: { action: 'parent' } },
      ...lines.map((line): PromptChoice<ExploreChoice> => ({
        name: formatEntryLine(line),
        value: { action: 'open', line },
      })),
      { name: 'Exit', value: { action: 'exit' } },
    ];
    const choice = await select({
      message: current,
      choices,
      pageSize: 20,
      loop: false,
    });

    if (choice.action === 'exit') {
      return;
    }

    if (choice.action === 'parent') {
      current = fileSystem.dir(current);
      continue;
    }

    const entryPath = fileSystem.join(current, choice.line.name);
    if (choice.line.kind === ENTRY_KIND.DIRECTORY) {
      current = entryPath;
      continue;
    }

    if (choice.line.kind === ENTRY_KIND.FILE) {
      const key = await fileSystem.modKey(entryPath);
      process.stdout.write(`${entryPath}\n  modification key: ${key}\n`);
      continue;
    }

    logger.warn({ path: entryPath, error: choice.line.error }, 'Entry is neither a file nor a directory');
  }
};

const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  return {
    command: command ?? null,
    positional: rest.filter((token) => token.length > 0),
  };
};

const printHelp = () => {
  process.stdout.write(`
Usage: cached-fs <command> [path]

Commands:
  ls [dir]        List a directory with one kind marker per entry (d, f, ?, !)
  cat <file>      Print a file
  modkey <file>   Print the modification key of a file
  explore [dir]   Browse directories interactively
  help            Show this message

Environment:
  CACHED_FS_MAX_OPEN_FILES   Files that may be open at once (default 32)
  LOG_LEVEL                  pino log level (default info)
`);
};

const run = async () => {
  try {
    await main();
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    process.exitCode = 1;
  }
};

void run();
