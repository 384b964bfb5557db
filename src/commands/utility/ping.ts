import type { ChatInputCommandInteraction } from 'discord.js';
import { SlashCommandBuilder } from 'discord.js';

import type { BotCommand, CommandContext } from '../../types.js';

const data = new SlashCommandBuilder().setName('ping').setDescription('Botの応答速度を確認します');

const execute = async (interaction: ChatInputCommandInteraction, _context: CommandContext) => {
  const sent = await interaction.reply({ content: '🏓 Pong!', fetchReply: true });
  const latency = sent.createdTimestamp - interaction.createdTimestamp;
  const gateway = interaction.client.ws.ping;
  const gatewayText = gateway >= 0 ? ` / Gateway: ${Math.round(gateway)}ms` : '';
  await interaction.editReply(`🏓 Pong! 応答: ${latency}ms${gatewayText}`);
};

const command: BotCommand = { data, execute };

export default command;
