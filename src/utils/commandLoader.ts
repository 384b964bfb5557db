import { readdir } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import { Collection } from 'discord.js';

import { describeError, logger } from './logger.js';
import type { BotCommand } from '../types.js';

const commandsDir = fileURLToPath(new URL('../commands/', import.meta.url));

const supportedExtensions = ['.js', '.ts'];

const isBotCommand = (value: unknown): value is BotCommand =>
  typeof value === 'object' &&
  value !== null &&
  'data' in value &&
  'execute' in value &&
  typeof value.execute === 'function';

/** Imports every module under commands/ and keys its default export by command name. */
export const loadCommands = async (directory = commandsDir): Promise<Collection<string, BotCommand>> => {
  const commands = new Collection<string, BotCommand>();
  const stack = [directory];

  while (stack.length > 0) {
    const currentDir = stack.pop();
    if (!currentDir) {
      continue;
    }
    const entries = await readdir(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        stack.push(entryPath);
        continue;
      }

      const { ext } = parse(entryPath);
      if (!supportedExtensions.includes(ext) || entry.name.endsWith('.d.ts')) {
        continue;
      }

      try {
        const imported: unknown = await import(pathToFileURL(entryPath).href);
        const command = typeof imported === 'object' && imported !== null && 'default' in imported ? imported.default : undefined;
        if (!isBotCommand(command)) {
          logger.warn('Skipping command without required exports', { entryPath });
          continue;
        }
        if (commands.has(command.data.name)) {
          logger.warn('Duplicate command name, keeping the first', { entryPath, name: command.data.name });
          continue;
        }
        commands.set(command.data.name, command);
      } catch (error) {
        logger.error('Failed loading command', { entryPath, error: describeError(error) });
      }
    }
  }

  return commands;
};
