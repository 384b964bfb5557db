import type {
  ChatInputCommandInteraction,
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder,
  SlashCommandSubcommandsOnlyBuilder
} from 'discord.js';

import type { SignupMachine } from './features/signup/signupMachine.js';
import type { PanelRendererDeps } from './rendering/panelRenderer.js';
import type { PanelStyle } from './rendering/style.js';
import type { Env } from './utils/env.js';

type SlashCommandDefinition =
  | SlashCommandBuilder
  | SlashCommandOptionsOnlyBuilder
  | SlashCommandSubcommandsOnlyBuilder;

export interface CommandContext {
  env: Env;
  panelStyle: Readonly<PanelStyle>;
  renderer: PanelRendererDeps;
  signup: SignupMachine;
}

export interface BotCommand {
  data: SlashCommandDefinition;
  execute: (interaction: ChatInputCommandInteraction, context: CommandContext) => Promise<void>;
  guildOnly?: boolean;
}
