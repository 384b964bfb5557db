import type { Guild, GuildMember } from 'discord.js';

import type { SignupGuild, SignupMember } from './signupMachine.js';

export const toSignupMember = (member: GuildMember): SignupMember => ({
  id: member.id,
  hasRole: (roleId) => member.roles.cache.has(roleId),
  addRole: async (roleId, reason) => {
    await member.roles.add(roleId, reason);
  },
  removeRole: async (roleId, reason) => {
    await member.roles.remove(roleId, reason);
  }
});

export const toSignupGuild = (guild: Guild): SignupGuild => {
  let membersLoaded: Promise<unknown> | null = null;

  return {
    id: guild.id,
    fetchRole: async (roleId) => {
      const role = await guild.roles.fetch(roleId.toString());
      return role ? { id: role.id, name: role.name } : null;
    },
    listRoleMembers: async (roleId) => {
      // Role membership is only complete once the member list is cached.
      membersLoaded ??= guild.members.fetch();
      await membersLoaded;
      const role = guild.roles.cache.get(roleId);
      return role ? [...role.members.keys()] : [];
    },
    removeMemberRole: async (memberId, roleId, reason) => {
      const member = await guild.members.fetch(memberId);
      await member.roles.remove(roleId, reason);
    }
  };
};
