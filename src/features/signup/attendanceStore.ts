import { z } from 'zod';

import { defaultAttendanceState, type AttendanceState } from '../../state.js';
import { KeyedLock } from '../../utils/keyedLock.js';
import { logger } from '../../utils/logger.js';
import type { JsonStorage } from '../../utils/storage.js';

/**
 * Per-guild set of members marked as having attended, waiting for the next
 * history registration. Every method is atomic with respect to the others on
 * the same guild.
 */
export interface AttendanceStore {
  list(guildId: string): Promise<string[]>;
  /** Adds the user when absent, removes it when present; resolves to the new membership. */
  toggle(guildId: string, userId: string): Promise<{ present: boolean; size: number }>;
  /** Returns the current members and empties the set in one step. */
  takeAll(guildId: string): Promise<string[]>;
  restore(guildId: string, userIds: string[]): Promise<void>;
}

const attendanceStateSchema = z.object({
  guilds: z.record(z.array(z.string()))
});

export class InMemoryAttendanceStore implements AttendanceStore {
  private readonly guilds = new Map<string, Set<string>>();
  private readonly lock = new KeyedLock();
  private readonly writes = new KeyedLock();
  private loading: Promise<void> | null = null;

  /**
   * With `storage`, the queue is reloaded on start and every change is written
   * before it becomes visible; a failed write leaves the queue untouched.
   */
  constructor(private readonly storage?: JsonStorage<AttendanceState>) {}

  async list(guildId: string): Promise<string[]> {
    await this.ensureLoaded();
    return this.lock.run(guildId, () => [...this.members(guildId)]);
  }

  async toggle(guildId: string, userId: string): Promise<{ present: boolean; size: number }> {
    await this.ensureLoaded();
    return this.lock.run(guildId, async () => {
      const next = new Set(this.members(guildId));
      const present = !next.has(userId);
      if (present) {
        next.add(userId);
      } else {
        next.delete(userId);
      }
      await this.commit(guildId, next);
      return { present, size: next.size };
    });
  }

  async takeAll(guildId: string): Promise<string[]> {
    await this.ensureLoaded();
    return this.lock.run(guildId, async () => {
      const members = [...this.members(guildId)];
      await this.commit(guildId, new Set());
      return members;
    });
  }

  async restore(guildId: string, userIds: string[]): Promise<void> {
    await this.ensureLoaded();
    await this.lock.run(guildId, async () => {
      const next = new Set(this.members(guildId));
      for (const userId of userIds) {
        next.add(userId);
      }
      await this.commit(guildId, next);
    });
  }

  private members(guildId: string): ReadonlySet<string> {
    return this.guilds.get(guildId) ?? new Set<string>();
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    if (!this.storage) {
      return;
    }
    const parsed = attendanceStateSchema.safeParse(await this.storage.read());
    if (!parsed.success) {
      logger.warn('Attendance storage has an unexpected shape, starting empty', {
        file: this.storage.path,
        error: parsed.error.message
      });
      return;
    }
    for (const [guildId, userIds] of Object.entries(parsed.data.guilds)) {
      if (userIds.length > 0) {
        this.guilds.set(guildId, new Set(userIds));
      }
    }
    logger.info('Attendance queue restored', { file: this.storage.path, guilds: this.guilds.size });
  }

  /** Persists the guild's next set, then swaps it in. */
  private async commit(guildId: string, next: Set<string>): Promise<void> {
    const apply = () => {
      if (next.size > 0) {
        this.guilds.set(guildId, next);
      } else {
        this.guilds.delete(guildId);
      }
    };

    const storage = this.storage;
    if (!storage) {
      apply();
      return;
    }

    // Writes for different guilds share one file, so each snapshot is taken
    // and written in turn.
    await this.writes.run(storage.path, async () => {
      const state: AttendanceState = { ...defaultAttendanceState, guilds: {} };
      for (const [id, members] of this.guilds) {
        if (id !== guildId && members.size > 0) {
          state.guilds[id] = [...members];
        }
      }
      if (next.size > 0) {
        state.guilds[guildId] = [...next];
      }
      await storage.write(state);
      apply();
    });
  }
}
