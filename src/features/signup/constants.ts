import { ButtonStyle } from 'discord.js';

export const SIGNUP_BUTTON_PREFIX = 'event-panel';

export type SignupAction = 'join' | 'watch' | 'attended';

export const SIGNUP_BUTTONS: Record<SignupAction, { label: string; style: ButtonStyle }> = {
  join: { label: '参加希望', style: ButtonStyle.Success },
  watch: { label: '観戦希望', style: ButtonStyle.Primary },
  attended: { label: '参加済み', style: ButtonStyle.Secondary }
};

export const SIGNUP_ACTIONS: SignupAction[] = ['join', 'watch', 'attended'];

export const PANEL_ATTACHMENT_NAME = 'event_panel.png';

export const PANEL_EMBED_COLOR = 0xf1c40f;

export const buildSignupCustomId = (action: SignupAction): string => `${SIGNUP_BUTTON_PREFIX}|${action}`;

export const parseSignupCustomId = (customId: string): SignupAction | null => {
  const [prefix, action] = customId.split('|');
  if (prefix !== SIGNUP_BUTTON_PREFIX) {
    return null;
  }
  return SIGNUP_ACTIONS.find((candidate) => candidate === action) ?? null;
};
