/**
 * Supabase implementation of IHostProfileRepository.
 * Turns are stored as a jsonb array on the host's row, oldest first.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { HostKey, HostProfile } from '../types/models.js';
import { formatHostKey } from '../utils/host-key.js';
import { profileToRow, rowToProfile } from './host-profile-mapper.js';
import type { IHostProfileRepository } from './IHostProfileRepository.js';

const TABLE = 'host_profiles';

export class SupabaseHostProfileRepository implements IHostProfileRepository {
  constructor(private readonly db: SupabaseClient) {}

  async find(hostKey: HostKey): Promise<HostProfile | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('host_key', formatHostKey(hostKey))
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch host profile: ${error.message}`);
    return data ? rowToProfile(data) : null;
  }

  async save(profile: HostProfile): Promise<void> {
    const { error } = await this.db
      .from(TABLE)
      .upsert(profileToRow(profile), { onConflict: 'host_key' });

    if (error) throw new Error(`Failed to save host profile: ${error.message}`);
  }

  async delete(hostKey: HostKey): Promise<void> {
    const { error } = await this.db
      .from(TABLE)
      .delete()
      .eq('host_key', formatHostKey(hostKey));

    if (error) throw new Error(`Failed to delete host profile: ${error.message}`);
  }
}
