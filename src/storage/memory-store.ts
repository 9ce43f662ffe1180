/**
 * In-memory storage implementation.
 *
 * Records live in an array so list order is insertion order. Every value
 * crossing the store boundary is a deep copy: callers can mutate what they
 * get back without touching stored state.
 */

import { Account, AccountFilter, AccountStatus, AccountUpdateFields, NewAccountFields } from '../domain/account';
import { AccountStore, Store } from './store';

/** Source of the current time; injectable for tests. */
export type Clock = () => Date;

export interface MemoryStoreOptions {
  /** Records loaded at construction, in order. Their ids seed the counter. */
  seed?: readonly Account[];
  clock?: Clock;
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Format a date as `YYYY-MM-DD` in the process's local time zone. */
export function toLocalDateString(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function matchesFilter(account: Account, filter?: AccountFilter): boolean {
  if (!filter) return true;
  if (filter.accountType !== undefined && account.accountType !== filter.accountType) return false;
  if (filter.status !== undefined && account.status !== filter.status) return false;
  return true;
}

export class MemoryAccountStore implements AccountStore {
  private data: Account[];
  private nextId: number;
  private readonly clock: Clock;

  constructor(options: MemoryStoreOptions = {}) {
    this.data = (options.seed ?? []).map(deepCopy);
    // Seeded ids set the floor; after that the counter only moves forward.
    this.nextId = this.data.reduce((max, account) => Math.max(max, account.id), 0) + 1;
    this.clock = options.clock ?? (() => new Date());
  }

  async create(fields: NewAccountFields): Promise<Account> {
    const account: Account = {
      id: this.nextId,
      firstName: fields.firstName,
      lastName: fields.lastName,
      email: fields.email,
      accountType: fields.accountType,
      department: fields.department,
      status: AccountStatus.Active,
      createdDate: toLocalDateString(this.clock()),
      balance: fields.balance,
    };
    this.nextId += 1;
    this.data.push(account);
    return deepCopy(account);
  }

  async getById(id: number): Promise<Account | null> {
    const account = this.data.find((a) => a.id === id);
    return account ? deepCopy(account) : null;
  }

  async update(id: number, fields: AccountUpdateFields): Promise<Account | null> {
    const existing = this.data.find((a) => a.id === id);
    if (!existing) return null;
    existing.firstName = fields.firstName;
    existing.lastName = fields.lastName;
    existing.email = fields.email;
    existing.accountType = fields.accountType;
    existing.department = fields.department;
    existing.status = fields.status;
    existing.balance = fields.balance;
    return deepCopy(existing);
  }

  async delete(id: number): Promise<boolean> {
    const index = this.data.findIndex((a) => a.id === id);
    if (index === -1) return false;
    this.data.splice(index, 1);
    return true;
  }

  async list(filter?: AccountFilter): Promise<Account[]> {
    return this.data.filter((a) => matchesFilter(a, filter)).map(deepCopy);
  }

  async count(): Promise<number> {
    return this.data.length;
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(options: MemoryStoreOptions = {}): Store {
  return {
    accounts: new MemoryAccountStore(options),
  };
}
