import type { HistoryRecord, HistorySink } from '../../services/historyWriter.js';
import { describeError, logger } from '../../utils/logger.js';
import { decodeRolePair, type RolePair } from '../../utils/payloadCodec.js';
import type { AttendanceStore } from './attendanceStore.js';
import { SignupError } from './errors.js';

export type SignupKind = 'participant' | 'spectator';

export interface SignupRole {
  id: string;
  name: string;
}

export interface SignupMember {
  id: string;
  hasRole(roleId: string): boolean;
  addRole(roleId: string, reason: string): Promise<void>;
  removeRole(roleId: string, reason: string): Promise<void>;
}

export interface SignupGuild {
  id: string;
  fetchRole(roleId: bigint): Promise<SignupRole | null>;
  listRoleMembers(roleId: string): Promise<string[]>;
  removeMemberRole(memberId: string, roleId: string, reason: string): Promise<void>;
}

export interface RoleToggleResult {
  status: 'granted' | 'removed';
  role: SignupRole;
}

export interface AttendanceToggleResult {
  status: 'added' | 'removed';
  size: number;
}

export interface SignupSnapshot {
  participantIds: string[];
  spectatorIds: string[];
  attendedIds: string[];
}

export interface HistoryRegistration {
  record: HistoryRecord;
  removed: number;
  failed: number;
}

interface SignupMachineOptions {
  attendance: AttendanceStore;
  history: HistorySink;
  now?: () => Date;
}

const roleIdFor = (kind: SignupKind, pair: RolePair): bigint =>
  kind === 'participant' ? pair.participantId : pair.spectatorId;

export class SignupMachine {
  private readonly attendance: AttendanceStore;
  private readonly history: HistorySink;
  private readonly now: () => Date;

  constructor({ attendance, history, now }: SignupMachineOptions) {
    this.attendance = attendance;
    this.history = history;
    this.now = now ?? (() => new Date());
  }

  /** Flips one role on the member using the ids hidden in the panel footer. */
  async toggleRole(
    kind: SignupKind,
    carrierText: string | null | undefined,
    guild: SignupGuild,
    member: SignupMember
  ): Promise<RoleToggleResult> {
    const pair = decodeRolePair(carrierText);
    const roleId = pair ? roleIdFor(kind, pair) : 0n;
    if (roleId === 0n) {
      throw new SignupError('missing-role-id', `Panel carries no ${kind} role id`);
    }

    const role = await this.requireRole(guild, roleId);
    const holding = member.hasRole(role.id);
    try {
      if (holding) {
        await member.removeRole(role.id, 'Event panel toggle off');
      } else {
        await member.addRole(role.id, 'Event panel toggle on');
      }
    } catch (error) {
      throw new SignupError('role-update-failed', `Could not update role ${role.id}: ${describeError(error)}`, {
        cause: error
      });
    }
    return { status: holding ? 'removed' : 'granted', role };
  }

  async toggleAttendance(guildId: string, userId: string): Promise<AttendanceToggleResult> {
    const { present, size } = await this.attendance.toggle(guildId, userId);
    return { status: present ? 'added' : 'removed', size };
  }

  async snapshot(guild: SignupGuild, roles: RolePair): Promise<SignupSnapshot> {
    const [participant, spectator] = await this.requireRoles(guild, roles);
    const [participantIds, spectatorIds, attendedIds] = await Promise.all([
      guild.listRoleMembers(participant.id),
      guild.listRoleMembers(spectator.id),
      this.attendance.list(guild.id)
    ]);
    return { participantIds, spectatorIds, attendedIds };
  }

  /**
   * Records the session, strips both signup roles from everyone holding them
   * and empties the attendance queue. Individual role removals may fail; they
   * are counted and the batch carries on.
   */
  async registerHistory(guild: SignupGuild, roles: RolePair, scenario: string): Promise<HistoryRegistration> {
    const [participant, spectator] = await this.requireRoles(guild, roles);
    const [participantIds, spectatorIds] = await Promise.all([
      guild.listRoleMembers(participant.id),
      guild.listRoleMembers(spectator.id)
    ]);
    const attendedIds = await this.attendance.takeAll(guild.id);

    const record: HistoryRecord = {
      scenario,
      timestamp: this.now(),
      participantIds,
      spectatorIds,
      attendedIds
    };

    try {
      await this.history.append(record);
    } catch (error) {
      try {
        await this.attendance.restore(guild.id, attendedIds);
      } catch (restoreError) {
        logger.error('Attendance queue could not be restored after a failed history write', {
          guildId: guild.id,
          attendedIds,
          error: describeError(restoreError)
        });
      }
      throw error;
    }

    let removed = 0;
    let failed = 0;
    const removals: Array<[string[], SignupRole]> = [
      [participantIds, participant],
      [spectatorIds, spectator]
    ];
    for (const [memberIds, role] of removals) {
      for (const memberId of memberIds) {
        try {
          await guild.removeMemberRole(memberId, role.id, `History registered: ${scenario}`);
          removed += 1;
        } catch (error) {
          failed += 1;
          logger.warn('Role removal failed during history registration', {
            guildId: guild.id,
            memberId,
            roleId: role.id,
            error: describeError(error)
          });
        }
      }
    }

    logger.info('History registered', { guildId: guild.id, scenario, removed, failed });
    return { record, removed, failed };
  }

  private async requireRole(guild: SignupGuild, roleId: bigint): Promise<SignupRole> {
    const role = await guild.fetchRole(roleId);
    if (!role) {
      throw new SignupError('role-not-found', `Role ${roleId} does not exist in guild ${guild.id}`);
    }
    return role;
  }

  private async requireRoles(guild: SignupGuild, roles: RolePair): Promise<[SignupRole, SignupRole]> {
    if (roles.participantId === 0n || roles.spectatorId === 0n) {
      throw new SignupError('missing-role-id', 'Participant and spectator role ids are both required');
    }
    return Promise.all([this.requireRole(guild, roles.participantId), this.requireRole(guild, roles.spectatorId)]);
  }
}
