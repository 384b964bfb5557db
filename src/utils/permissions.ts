import { PermissionFlagsBits, type GuildMember } from 'discord.js';

/** Anyone may create panels unless an allowed role is configured. */
export const canCreatePanels = (member: GuildMember, allowedRoleId: bigint): boolean =>
  allowedRoleId === 0n || member.roles.cache.has(allowedRoleId.toString());

export const isAdminOrAllowed = (member: GuildMember, allowedRoleId: bigint): boolean =>
  member.permissions.has(PermissionFlagsBits.Administrator) ||
  (allowedRoleId !== 0n && member.roles.cache.has(allowedRoleId.toString()));
