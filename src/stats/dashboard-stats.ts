/**
 * Dashboard aggregates. Recomputed from the live records on every call.
 */

import { Account, AccountStatus } from '../domain/account';

export interface DashboardStats {
  total: number;
  active: number;
  inactive: number;
  totalBalance: number;
  /** 0 when there are no accounts. */
  averageBalance: number;
}

export const RECENT_ACCOUNTS_LIMIT = 5;

export function computeStats(accounts: readonly Account[]): DashboardStats {
  const total = accounts.length;
  const active = accounts.filter((a) => a.status === AccountStatus.Active).length;
  const totalBalance = accounts.reduce((sum, a) => sum + a.balance, 0);
  return {
    total,
    active,
    inactive: total - active,
    totalBalance,
    averageBalance: total > 0 ? totalBalance / total : 0,
  };
}

/** Newest first by creation date; accounts created the same day keep list order. */
export function recentAccounts(accounts: readonly Account[], limit = RECENT_ACCOUNTS_LIMIT): Account[] {
  return [...accounts]
    .sort((a, b) => (a.createdDate < b.createdDate ? 1 : a.createdDate > b.createdDate ? -1 : 0))
    .slice(0, limit);
}
