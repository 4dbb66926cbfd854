/**
 * In-memory implementation of IHostProfileRepository.
 * History lives as long as the process. Profiles are copied in and out so
 * callers never share the stored arrays.
 */

import type { HostKey, HostProfile } from '../types/models.js';
import { formatHostKey } from '../utils/host-key.js';
import type { IHostProfileRepository } from './IHostProfileRepository.js';

function copy(profile: HostProfile): HostProfile {
  return {
    hostKey: { ...profile.hostKey },
    facts: profile.facts ? { ...profile.facts } : null,
    // Turns are frozen; copying the array is enough.
    turns: [...profile.turns],
    updatedAt: profile.updatedAt,
  };
}

export class InMemoryHostProfileRepository implements IHostProfileRepository {
  private readonly profiles = new Map<string, HostProfile>();

  async find(hostKey: HostKey): Promise<HostProfile | null> {
    const profile = this.profiles.get(formatHostKey(hostKey));
    return profile ? copy(profile) : null;
  }

  async save(profile: HostProfile): Promise<void> {
    this.profiles.set(formatHostKey(profile.hostKey), copy(profile));
  }

  async delete(hostKey: HostKey): Promise<void> {
    this.profiles.delete(formatHostKey(hostKey));
  }

  get size(): number {
    return this.profiles.size;
  }
}
