import { Client, Events, GatewayIntentBits, Interaction, MessageFlags } from 'discord.js';

import { InMemoryAttendanceStore } from './features/signup/attendanceStore.js';
import { createSignupInteractionHandler } from './features/signup/interactionHandler.js';
import { SignupMachine } from './features/signup/signupMachine.js';
import { FontResolver } from './rendering/fontResolver.js';
import { buildPanelStyle } from './rendering/style.js';
import { CsvHistoryWriter } from './services/historyWriter.js';
import { ImageClient } from './services/imageClient.js';
import { defaultAttendanceState, type AttendanceState } from './state.js';
import type { CommandContext } from './types.js';
import { loadCommands } from './utils/commandLoader.js';
import { getEnv } from './utils/env.js';
import { configureLogger, describeError, logger } from './utils/logger.js';
import { JsonStorage } from './utils/storage.js';

const GENERIC_FAILURE = '❌ コマンドの実行中にエラーが発生しました。';

const bootstrap = async () => {
  const env = getEnv();
  configureLogger(env.LOG_LEVEL);
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers]
  });

  const attendanceStorage = env.ATTENDANCE_STORAGE_PATH
    ? new JsonStorage<AttendanceState>(env.ATTENDANCE_STORAGE_PATH, defaultAttendanceState)
    : undefined;

  const signup = new SignupMachine({
    attendance: new InMemoryAttendanceStore(attendanceStorage),
    history: new CsvHistoryWriter(env.HISTORY_CSV_PATH)
  });

  const commandContext: CommandContext = {
    env,
    panelStyle: buildPanelStyle(env),
    renderer: {
      fonts: new FontResolver({ fontPath: env.FONT_PATH, fontUrl: env.FONT_URL }),
      images: new ImageClient()
    },
    signup
  };

  const commands = await loadCommands();
  const handleSignupButton = createSignupInteractionHandler({ machine: signup });

  client.once(Events.ClientReady, (readyClient: Client<true>) => {
    logger.info('Bot is ready', { tag: readyClient.user.tag, commands: commands.size });
  });

  client.on(Events.InteractionCreate, async (interaction: Interaction) => {
    try {
      if (await handleSignupButton(interaction)) {
        return;
      }
    } catch (error) {
      logger.error('Button interaction failed', { error: describeError(error) });
      return;
    }

    if (!interaction.isChatInputCommand()) {
      return;
    }

    const command = commands.get(interaction.commandName);
    if (!command) {
      await interaction.reply({ content: '不明なコマンドです。', flags: MessageFlags.Ephemeral });
      return;
    }

    if (command.guildOnly && !interaction.inGuild()) {
      await interaction.reply({ content: 'このコマンドはサーバー内でのみ使用できます。', flags: MessageFlags.Ephemeral });
      return;
    }

    try {
      await command.execute(interaction, commandContext);
    } catch (error) {
      logger.error('Command execution failed', {
        command: interaction.commandName,
        error: describeError(error)
      });
      try {
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
        } else {
          await interaction.reply({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
        }
      } catch (replyError) {
        logger.warn('Could not report command failure', {
          command: interaction.commandName,
          error: describeError(replyError)
        });
      }
    }
  });

  await client.login(env.DISCORD_TOKEN);
};

bootstrap().catch((error: unknown) => {
  logger.error('Fatal startup error', {
    error: error instanceof Error ? error.stack : String(error)
  });
  process.exit(1);
});
