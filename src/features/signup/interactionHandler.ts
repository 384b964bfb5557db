import { MessageFlags, type ButtonInteraction, type Interaction } from 'discord.js';

import { describeError, logger } from '../../utils/logger.js';
import { parseSignupCustomId, type SignupAction } from './constants.js';
import { toSignupGuild, toSignupMember } from './discordMembership.js';
import { SIGNUP_ERROR_MESSAGES, isSignupError } from './errors.js';
import type { SignupKind, SignupMachine } from './signupMachine.js';

interface SignupInteractionHandlerOptions {
  machine: SignupMachine;
}

const ROLE_KIND: Record<Exclude<SignupAction, 'attended'>, SignupKind> = {
  join: 'participant',
  watch: 'spectator'
};

const GENERIC_FAILURE = '処理中にエラーが発生しました。';

export const createSignupInteractionHandler = ({ machine }: SignupInteractionHandlerOptions) => {
  const runAction = async (interaction: ButtonInteraction<'cached'>, action: SignupAction): Promise<string> => {
    if (action === 'attended') {
      const result = await machine.toggleAttendance(interaction.guildId, interaction.user.id);
      return result.status === 'added'
        ? `✅ 参加済みとして登録しました。（現在 ${result.size} 名）`
        : '✅ 参加済みの登録を取り消しました。';
    }

    const footer = interaction.message.embeds.at(0)?.footer?.text;
    const result = await machine.toggleRole(
      ROLE_KIND[action],
      footer,
      toSignupGuild(interaction.guild),
      toSignupMember(interaction.member)
    );
    return result.status === 'granted'
      ? `✅ ${result.role.name} を付与しました。`
      : `✅ ${result.role.name} を解除しました。`;
  };

  return async (interaction: Interaction): Promise<boolean> => {
    if (!interaction.isButton()) {
      return false;
    }
    const action = parseSignupCustomId(interaction.customId);
    if (!action) {
      return false;
    }

    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SIGNUP_ERROR_MESSAGES['guild-only'], flags: MessageFlags.Ephemeral });
      return true;
    }

    await interaction.deferReply({ flags: MessageFlags.Ephemeral });

    try {
      await interaction.editReply(await runAction(interaction, action));
    } catch (error) {
      if (isSignupError(error)) {
        logger.warn('Signup action rejected', {
          action,
          guildId: interaction.guildId,
          userId: interaction.user.id,
          code: error.code,
          error: error.message
        });
        await interaction.editReply(SIGNUP_ERROR_MESSAGES[error.code]);
        return true;
      }
      logger.error('Signup action failed', {
        action,
        guildId: interaction.guildId,
        userId: interaction.user.id,
        error: describeError(error)
      });
      await interaction.editReply(GENERIC_FAILURE);
    }
    return true;
  };
};
