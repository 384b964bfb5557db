import {
  MessageFlags,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction
} from 'discord.js';

import { SIGNUP_ERROR_MESSAGES, isSignupError } from '../../features/signup/errors.js';
import { toSignupGuild } from '../../features/signup/discordMembership.js';
import {
  MISSING_ROLE_CONFIG_MESSAGE,
  participantRoleOption,
  resolveRoleOverrides,
  spectatorRoleOption
} from '../../features/signup/roleOptions.js';
import type { HistoryRegistration } from '../../features/signup/signupMachine.js';
import type { BotCommand, CommandContext } from '../../types.js';
import { describeError, logger } from '../../utils/logger.js';
import { isAdminOrAllowed } from '../../utils/permissions.js';

const data = new SlashCommandBuilder()
  .setName('register_history')
  .setDescription('参加履歴を記録し、参加・観戦ロールと参加済みリストをリセットします')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .addStringOption((option) =>
    option.setName('scenario').setDescription('シナリオ名').setRequired(true).setMaxLength(200)
  )
  .addRoleOption(participantRoleOption)
  .addRoleOption(spectatorRoleOption);

export const formatRegistrationSummary = ({ record, removed, failed }: HistoryRegistration): string => {
  const lines = [
    `✅ 「${record.scenario}」の履歴を登録しました。`,
    `参加希望: ${record.participantIds.length}名 / 観戦希望: ${record.spectatorIds.length}名 / 参加済み: ${record.attendedIds.length}名`,
    `ロール解除: ${removed}件`
  ];
  if (failed > 0) {
    lines.push(`⚠️ ${failed}件のロール解除に失敗しました。Botの権限をご確認ください。`);
  }
  return lines.join('\n');
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

  const scenario = interaction.options.getString('scenario', true).trim();
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const result = await context.signup.registerHistory(toSignupGuild(interaction.guild), roles, scenario);
    await interaction.editReply(formatRegistrationSummary(result));
  } catch (error) {
    if (isSignupError(error)) {
      await interaction.editReply(SIGNUP_ERROR_MESSAGES[error.code]);
      return;
    }
    logger.error('History registration failed', { guildId: interaction.guildId, error: describeError(error) });
    await interaction.editReply('❌ 履歴の登録に失敗しました。参加済みリストは保持されています。');
  }
};

const command: BotCommand = { data, execute, guildOnly: true };

export default command;
