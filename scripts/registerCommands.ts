import { REST, Routes } from 'discord.js';

import { getEnv, resolveCommandGuilds } from '../src/utils/env.js';
import { loadCommands } from '../src/utils/commandLoader.js';
import { configureLogger, describeError, logger } from '../src/utils/logger.js';

const register = async () => {
  const env = getEnv();
  configureLogger(env.LOG_LEVEL);
  const rest = new REST({ version: '10' }).setToken(env.DISCORD_TOKEN);

  const commands = (await loadCommands()).map((command) => command.data.toJSON());
  const guilds = resolveCommandGuilds(env);

  if (guilds.length === 0) {
    await rest.put(Routes.applicationCommands(env.DISCORD_CLIENT_ID), { body: commands });
    logger.info('Registered global commands', { count: commands.length });
    return;
  }

  for (const guildId of guilds) {
    try {
      await rest.put(Routes.applicationGuildCommands(env.DISCORD_CLIENT_ID, guildId), { body: commands });
      logger.info('Registered guild commands', { guildId, count: commands.length });
    } catch (error) {
      logger.error('Failed to register guild commands', { guildId, error: describeError(error) });
      process.exitCode = 1;
    }
  }
};

register().catch((error: unknown) => {
  logger.error('Failed to register commands', { error: describeError(error) });
  process.exitCode = 1;
});
