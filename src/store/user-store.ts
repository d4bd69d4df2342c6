import { Slab } from './slab.js';

export type UserId = number;

/**
 * User payload. Carries no fields yet; its text form is `{}`.
 */
export type UserRecord = Record<string, never>;

export function createUserRecord(): UserRecord {
  return {};
}

export function formatUserRecord(record: UserRecord): string {
  return JSON.stringify(record);
}

/**
 * In-memory user records addressed by slot ids.
 *
 * Ids are unique among live records only: a removed id is handed out again
 * by a later insert. Every method is synchronous, so a call always finishes
 * before another request can touch the store.
 */
export class UserStore {
  private users = new Slab<UserRecord>();

  get size(): number {
    return this.users.size;
  }

  /**
   * Store a record in the lowest free slot and return its id.
   */
  insert(record: UserRecord = createUserRecord()): UserId {
    return this.users.insert(record);
  }

  get(id: UserId): UserRecord | null {
    return this.users.get(id);
  }

  /**
   * Replace the record at `id`. Returns false if no such user exists.
   */
  update(id: UserId, record: UserRecord): boolean {
    return this.users.set(id, record);
  }

  /**
   * Delete the user at `id`. Returns false if no such user exists.
   */
  remove(id: UserId): boolean {
    return this.users.remove(id);
  }

  /**
   * Live ids in slot order, low to high.
   */
  list(): UserId[] {
    return this.users.keys();
  }
}
