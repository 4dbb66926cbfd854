/**
 * Host profile data access interface.
 * One profile per `address:port:user`; the Host Memory Store is the only writer.
 */

import type { HostKey, HostProfile } from '../types/models.js';

export interface IHostProfileRepository {
  /** Load a host's profile, or null if the host has never been seen. */
  find(hostKey: HostKey): Promise<HostProfile | null>;

  /** Insert or replace the whole profile. */
  save(profile: HostProfile): Promise<void>;

  /** Remove a host's profile. No-op when it doesn't exist. */
  delete(hostKey: HostKey): Promise<void>;
}
