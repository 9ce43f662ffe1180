/**
 * JSON wire shapes. The API speaks snake_case field names; the domain
 * model stays camelCase.
 */

import { Account } from '../domain/account';
import { DashboardStats } from '../stats/dashboard-stats';

export interface AccountJson {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  account_type: string;
  department: string;
  status: string;
  created_date: string;
  balance: number;
}

export interface StatsJson {
  total_accounts: number;
  active_accounts: number;
  inactive_accounts: number;
  total_balance: number;
  average_balance: number;
}

export function toAccountJson(account: Account): AccountJson {
  return {
    id: account.id,
    first_name: account.firstName,
    last_name: account.lastName,
    email: account.email,
    account_type: account.accountType,
    department: account.department,
    status: account.status,
    created_date: account.createdDate,
    balance: account.balance,
  };
}

export function toStatsJson(stats: DashboardStats): StatsJson {
  return {
    total_accounts: stats.total,
    active_accounts: stats.active,
    inactive_accounts: stats.inactive,
    total_balance: stats.totalBalance,
    average_balance: stats.averageBalance,
  };
}
