/**
 * Storage layer interfaces.
 *
 * Defines the contract for account persistence. The only shipped backend
 * is in memory, but handlers and services depend on this interface alone.
 */

import { Account, AccountFilter, AccountUpdateFields, NewAccountFields } from '../domain/account';

/** Store interface for accounts. */
export interface AccountStore {
  /**
   * Append a new account. Assigns the next id, today's date and the
   * active status. Callers validate first; this never fails.
   */
  create(fields: NewAccountFields): Promise<Account>;
  getById(id: number): Promise<Account | null>;
  /** Replace every mutable field. Resolves null when the id is unknown. */
  update(id: number, fields: AccountUpdateFields): Promise<Account | null>;
  /** Resolves false when the id is unknown. */
  delete(id: number): Promise<boolean>;
  /** Accounts matching every present filter field, in insertion order. */
  list(filter?: AccountFilter): Promise<Account[]>;
  count(): Promise<number>;
}

/** Top-level store with all sub-stores. */
export interface Store {
  accounts: AccountStore;
}
