import { EmbedBuilder, MessageFlags, SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';

import { PANEL_EMBED_COLOR } from '../../features/signup/constants.js';
import { SIGNUP_ERROR_MESSAGES, isSignupError } from '../../features/signup/errors.js';
import { toSignupGuild } from '../../features/signup/discordMembership.js';
import {
  MISSING_ROLE_CONFIG_MESSAGE,
  participantRoleOption,
  resolveRoleOverrides,
  spectatorRoleOption
} from '../../features/signup/roleOptions.js';
import type { BotCommand, CommandContext } from '../../types.js';
import { isAdminOrAllowed } from '../../utils/permissions.js';

const data = new SlashCommandBuilder()
  .setName('signup_status')
  .setDescription('参加希望・観戦希望・参加済みの一覧を表示します')
  .addRoleOption(participantRoleOption)
  .addRoleOption(spectatorRoleOption);

const FIELD_LIMIT = 1_024;
const EMPTY_FIELD = 'なし';

/** Joins member mentions, cutting the list where an embed field would overflow. */
export const formatMentionField = (userIds: readonly string[], limit = FIELD_LIMIT): string => {
  if (userIds.length === 0) {
    return EMPTY_FIELD;
  }
  let text = '';
  for (const [index, userId] of userIds.entries()) {
    const mention = `<@${userId}>`;
    const next = text ? `${text} ${mention}` : mention;
    const suffix = ` …他${userIds.length - index}名`;
    if (next.length + (index < userIds.length - 1 ? suffix.length : 0) > limit) {
      return `${text}${suffix}`;
    }
    text = next;
  }
  return text;
};

const execute = async (interaction: ChatInputCommandInteraction, context: CommandContext) => {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: SIGNUP_ERROR_MESSAGES['guild-only'], flags: MessageFlags.Ephemeral });
    return;
  }

  if (!isAdminOrAllowed(interaction.member, context.env.ALLOWED_ROLE_ID)) {
    await interaction.reply({ content: '❌ この操作を行う権限がありません。', flags: MessageFlags.Ephemeral });
    return;
  }

  const roles = resolveRoleOverrides(interaction, context.env);
  if (roles.participantId === 0n || roles.spectatorId === 0n) {
    await interaction.reply({ content: MISSING_ROLE_CONFIG_MESSAGE, flags: MessageFlags.Ephemeral });
    return;
  }

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const snapshot = await context.signup.snapshot(toSignupGuild(interaction.guild), roles);
    const embed = new EmbedBuilder()
      .setColor(PANEL_EMBED_COLOR)
      .setTitle('募集状況')
      .addFields(
        { name: `参加希望（${snapshot.participantIds.length}名）`, value: formatMentionField(snapshot.participantIds) },
        { name: `観戦希望（${snapshot.spectatorIds.length}名）`, value: formatMentionField(snapshot.spectatorIds) },
        { name: `参加済み（${snapshot.attendedIds.length}名）`, value: formatMentionField(snapshot.attendedIds) }
      )
      .setTimestamp(new Date());
    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    if (isSignupError(error)) {
      await interaction.editReply(SIGNUP_ERROR_MESSAGES[error.code]);
      return;
    }
    throw error;
  }
};

const command: BotCommand = { data, execute, guildOnly: true };

export default command;
