/**
 * Host memory store.
 * Per-host interaction history keyed by `address:port:user`. Writes for one
 * host go through a keyed mutex so appends land in call order; hosts never
 * wait on each other. Past `maxTurns` the oldest turns are evicted.
 */

import type { IHostProfileRepository } from '../repositories/IHostProfileRepository.js';
import type { HostContext, HostFacts, HostKey, HostProfile, Turn } from '../types/models.js';
import { formatHostKey } from '../utils/host-key.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';

export const DEFAULT_MAX_TURNS = 100;

export interface HostMemoryStoreOptions {
  /** Retention bound per host. Default: 100. */
  maxTurns?: number;
  clock?: () => Date;
}

export interface HostSummary {
  turnCount: number;
  lastTurnAt: Date | null;
  /** Newest first. */
  recentCommands: string[];
}

function emptyProfile(hostKey: HostKey): HostProfile {
  return { hostKey: { ...hostKey }, facts: null, turns: [], updatedAt: null };
}

export class HostMemoryStore {
  private readonly writes = new KeyedMutex();
  private readonly maxTurns: number;
  private readonly clock: () => Date;

  constructor(
    private readonly repo: IHostProfileRepository,
    options: HostMemoryStoreOptions = {}
  ) {
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS);
    this.clock = options.clock ?? (() => new Date());
  }

  async append(hostKey: HostKey, turn: Turn): Promise<void> {
    const frozen = Object.freeze({ ...turn });

    await this.update(hostKey, (profile) => {
      profile.turns.push(frozen);
      if (profile.turns.length > this.maxTurns) {
        profile.turns.splice(0, profile.turns.length - this.maxTurns);
      }
    });
  }

  /** The newest `limit` turns, oldest first. */
  async recentContext(hostKey: HostKey, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const profile = await this.repo.find(hostKey);
    return profile ? profile.turns.slice(-limit) : [];
  }

  /** Facts plus the newest `limit` turns, as handed to a completion provider. */
  async hostContext(hostKey: HostKey, limit: number): Promise<HostContext> {
    const profile = await this.repo.find(hostKey);
    return {
      facts: profile?.facts ?? null,
      turns: profile && limit > 0 ? profile.turns.slice(-limit) : [],
    };
  }

  /** The stored profile, or an empty one for a host never seen. */
  async profile(hostKey: HostKey): Promise<HostProfile> {
    return (await this.repo.find(hostKey)) ?? emptyProfile(hostKey);
  }

  async recordFacts(hostKey: HostKey, facts: HostFacts): Promise<void> {
    await this.update(hostKey, (profile) => {
      profile.facts = { ...facts };
    });
  }

  /** Turns whose intent or command contains `keyword`, case-insensitive, oldest first. */
  async search(hostKey: HostKey, keyword: string): Promise<Turn[]> {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];

    const profile = await this.repo.find(hostKey);
    if (!profile) return [];

    return profile.turns.filter(
      (turn) =>
        turn.intentText.toLowerCase().includes(needle) ||
        turn.commandText.toLowerCase().includes(needle)
    );
  }

  async summary(hostKey: HostKey, recentCount = 5): Promise<HostSummary> {
    const profile = await this.repo.find(hostKey);
    const turns = profile?.turns ?? [];
    const last = turns[turns.length - 1];

    return {
      turnCount: turns.length,
      lastTurnAt: last ? last.timestamp : null,
      recentCommands: turns
        .slice(recentCount > 0 ? -recentCount : turns.length)
        .reverse()
        .map((turn) => turn.commandText),
    };
  }

  /** Drop a host's turns. Facts are kept. */
  async clear(hostKey: HostKey): Promise<void> {
    await this.writes.run(formatHostKey(hostKey), async () => {
      const profile = await this.repo.find(hostKey);
      if (!profile) return;
      await this.repo.save({ ...profile, turns: [], updatedAt: this.clock() });
    });
  }

  /** Forget a host entirely: facts and turns. */
  async forget(hostKey: HostKey): Promise<void> {
    await this.writes.run(formatHostKey(hostKey), () => this.repo.delete(hostKey));
  }

  private async update(hostKey: HostKey, mutate: (profile: HostProfile) => void): Promise<void> {
    await this.writes.run(formatHostKey(hostKey), async () => {
      const profile = (await this.repo.find(hostKey)) ?? emptyProfile(hostKey);
      mutate(profile);
      profile.updatedAt = this.clock();
      await this.repo.save(profile);
    });
  }
}
