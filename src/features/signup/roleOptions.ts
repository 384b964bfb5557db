import type { ChatInputCommandInteraction, SlashCommandRoleOption } from 'discord.js';

import type { Env } from '../../utils/env.js';
import type { RolePair } from '../../utils/payloadCodec.js';

export const PARTICIPANT_ROLE_OPTION = 'participant_role';
export const SPECTATOR_ROLE_OPTION = 'spectator_role';

export const participantRoleOption = (option: SlashCommandRoleOption) =>
  option.setName(PARTICIPANT_ROLE_OPTION).setDescription('参加希望ロール（未指定なら環境変数）');

export const spectatorRoleOption = (option: SlashCommandRoleOption) =>
  option.setName(SPECTATOR_ROLE_OPTION).setDescription('観戦希望ロール（未指定なら環境変数）');

/** Command options win over the configured defaults; 0n marks a missing id. */
export const resolveRoleOverrides = (interaction: ChatInputCommandInteraction, env: Env): RolePair => {
  const participant = interaction.options.getRole(PARTICIPANT_ROLE_OPTION);
  const spectator = interaction.options.getRole(SPECTATOR_ROLE_OPTION);
  return {
    participantId: participant ? BigInt(participant.id) : env.PARTICIPANT_ROLE_ID,
    spectatorId: spectator ? BigInt(spectator.id) : env.SPECTATOR_ROLE_ID
  };
};

export const MISSING_ROLE_CONFIG_MESSAGE =
  '❗ 参加/観戦ロールIDが未設定です。環境変数（PARTICIPANT_ROLE_ID / SPECTATOR_ROLE_ID）を設定するか、コマンド引数でロール指定してください。';
