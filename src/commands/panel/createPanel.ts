import { MessageFlags, SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';

import { buildSignupPanelMessage } from '../../features/signup/panel.js';
import {
  MISSING_ROLE_CONFIG_MESSAGE,
  participantRoleOption,
  resolveRoleOverrides,
  spectatorRoleOption
} from '../../features/signup/roleOptions.js';
import { renderPanel, type EventSpec } from '../../rendering/panelRenderer.js';
import type { BotCommand, CommandContext } from '../../types.js';
import { describeError, logger } from '../../utils/logger.js';
import { canCreatePanels } from '../../utils/permissions.js';

const data = new SlashCommandBuilder()
  .setName('create_panel')
  .setDescription('イベント告知パネルを作成します')
  .addStringOption((option) => option.setName('title').setDescription('タイトル').setRequired(true).setMaxLength(100))
  .addStringOption((option) => option.setName('date_time').setDescription('開催予定日時').setRequired(true))
  .addStringOption((option) => option.setName('players').setDescription('プレイヤー数（例: 6）').setRequired(true))
  .addStringOption((option) => option.setName('duration').setDescription('想定プレイ時間').setRequired(true))
  .addStringOption((option) =>
    option.setName('note').setDescription('一言（\\n で改行）').setRequired(true).setMaxLength(1_000)
  )
  .addStringOption((option) => option.setName('bg_image_url').setDescription('背景画像のURL'))
  .addStringOption((option) => option.setName('corner_image_url').setDescription('右上に表示する画像のURL'))
  .addRoleOption(participantRoleOption)
  .addRoleOption(spectatorRoleOption);

/** Slash command options cannot carry newlines, so a typed `\n` stands in for one. */
export const expandNoteBreaks = (note: string): string => note.replace(/\\n/g, '\n');

const optionalUrl = (value: string | null): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const execute = async (interaction: ChatInputCommandInteraction, context: CommandContext) => {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: '❌ サーバー内でのみ使用できます。', flags: MessageFlags.Ephemeral });
    return;
  }

  if (!canCreatePanels(interaction.member, context.env.ALLOWED_ROLE_ID)) {
    await interaction.reply({ content: '❌ パネルを作成する権限がありません。', flags: MessageFlags.Ephemeral });
    return;
  }

  const roles = resolveRoleOverrides(interaction, context.env);
  if (roles.participantId === 0n || roles.spectatorId === 0n) {
    await interaction.reply({ content: MISSING_ROLE_CONFIG_MESSAGE, flags: MessageFlags.Ephemeral });
    return;
  }

  const spec: EventSpec = {
    title: interaction.options.getString('title', true),
    dateTime: interaction.options.getString('date_time', true),
    players: interaction.options.getString('players', true),
    duration: interaction.options.getString('duration', true),
    note: expandNoteBreaks(interaction.options.getString('note', true)),
    backgroundUrl: optionalUrl(interaction.options.getString('bg_image_url')) ?? context.env.DEFAULT_BG_IMAGE_URL,
    thumbnailUrl: optionalUrl(interaction.options.getString('corner_image_url'))
  };

  // Image downloads can exceed the 3 second interaction window.
  await interaction.deferReply();

  try {
    const panel = await renderPanel(spec, context.panelStyle, context.renderer);
    await interaction.editReply(buildSignupPanelMessage(panel, roles));
    logger.info('Event panel created', {
      guildId: interaction.guildId,
      userId: interaction.user.id,
      title: spec.title
    });
  } catch (error) {
    logger.error('Event panel creation failed', { guildId: interaction.guildId, error: describeError(error) });
    await interaction.editReply({ content: '❌ パネルの作成に失敗しました。' });
  }
};

const command: BotCommand = { data, execute, guildOnly: true };

export default command;
