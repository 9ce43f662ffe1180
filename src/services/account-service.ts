/**
 * Account Service.
 *
 * The single entry point handlers use to read and change accounts. Each
 * mutation validates against the current records and writes inside one
 * MutationLock section, so two requests can never both pass the email
 * uniqueness check and then both write.
 */

import { Account, AccountFilter, AccountFormInput, fullName } from '../domain/account';
import { TypedError } from '../domain/errors';
import { Store } from '../storage/store';
import { DashboardStats, RECENT_ACCOUNTS_LIMIT, computeStats, recentAccounts } from '../stats/dashboard-stats';
import { validateCreateInput, validateEditInput } from '../validation/account-validator';
import { MutationLock } from './mutation-lock';
import { logger as rootLogger } from '../logger';

/** Outcome of a create or edit. */
export type AccountMutationResult =
  | { status: 'ok'; account: Account }
  | { status: 'invalid'; errors: TypedError[] }
  | { status: 'not_found' };

/** Outcome of a delete. */
export type AccountDeleteResult = { status: 'ok'; account: Account } | { status: 'not_found' };

const logger = rootLogger.child({ service: 'accounts' });

export class AccountService {
  private readonly lock = new MutationLock();

  constructor(private store: Store) {}

  async list(filter?: AccountFilter): Promise<Account[]> {
    return this.store.accounts.list(filter);
  }

  async get(id: number): Promise<Account | null> {
    return this.store.accounts.getById(id);
  }

  async count(): Promise<number> {
    return this.store.accounts.count();
  }

  async stats(): Promise<DashboardStats> {
    return computeStats(await this.store.accounts.list());
  }

  async recent(limit = RECENT_ACCOUNTS_LIMIT): Promise<Account[]> {
    return recentAccounts(await this.store.accounts.list(), limit);
  }

  async create(input: AccountFormInput): Promise<AccountMutationResult> {
    return this.lock.run<AccountMutationResult>(async () => {
      const existing = await this.store.accounts.list();
      const result = validateCreateInput(input, existing);
      if (!result.valid) {
        logger.debug('Account create rejected', { errors: result.errors.map((e) => e.code) });
        return { status: 'invalid', errors: result.errors };
      }
      const account = await this.store.accounts.create(result.value);
      logger.info('Account created', { accountId: account.id });
      return { status: 'ok', account };
    });
  }

  async update(id: number, input: AccountFormInput): Promise<AccountMutationResult> {
    return this.lock.run<AccountMutationResult>(async () => {
      if (!(await this.store.accounts.getById(id))) {
        return { status: 'not_found' };
      }
      const existing = await this.store.accounts.list();
      const result = validateEditInput(id, input, existing);
      if (!result.valid) {
        logger.debug('Account update rejected', { accountId: id, errors: result.errors.map((e) => e.code) });
        return { status: 'invalid', errors: result.errors };
      }
      const account = await this.store.accounts.update(id, result.value);
      if (!account) {
        return { status: 'not_found' };
      }
      logger.info('Account updated', { accountId: id });
      return { status: 'ok', account };
    });
  }

  async delete(id: number): Promise<AccountDeleteResult> {
    return this.lock.run<AccountDeleteResult>(async () => {
      const account = await this.store.accounts.getById(id);
      if (!account || !(await this.store.accounts.delete(id))) {
        return { status: 'not_found' };
      }
      logger.info('Account deleted', { accountId: id, name: fullName(account) });
      return { status: 'ok', account };
    });
  }
}
