import { ActionRowBuilder, AttachmentBuilder, ButtonBuilder, EmbedBuilder } from 'discord.js';

import type { RenderedPanel } from '../../rendering/panelRenderer.js';
import { encodeRolePair, type RolePair } from '../../utils/payloadCodec.js';
import {
  PANEL_ATTACHMENT_NAME,
  PANEL_EMBED_COLOR,
  SIGNUP_ACTIONS,
  SIGNUP_BUTTONS,
  buildSignupCustomId
} from './constants.js';

export const buildSignupButtons = () =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    SIGNUP_ACTIONS.map((action) =>
      new ButtonBuilder()
        .setCustomId(buildSignupCustomId(action))
        .setLabel(SIGNUP_BUTTONS[action].label)
        .setStyle(SIGNUP_BUTTONS[action].style)
    )
  );

export const buildSignupPanelMessage = (panel: RenderedPanel, roles: RolePair) => {
  const file = new AttachmentBuilder(panel.png, { name: PANEL_ATTACHMENT_NAME });

  const embed = new EmbedBuilder()
    .setColor(PANEL_EMBED_COLOR)
    .setTitle('マーダーミステリー開催！')
    .setDescription('下のボタンから「参加希望 / 観戦希望」を選べます。参加後は「参加済み」を押してください。')
    .setImage(`attachment://${PANEL_ATTACHMENT_NAME}`)
    // Invisible in the client; the button handler reads the role ids back from it.
    .setFooter({ text: encodeRolePair(roles) });

  return { embeds: [embed], files: [file], components: [buildSignupButtons()] };
};
