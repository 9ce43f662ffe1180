/**
 * Demo records loaded at startup. State resets to these on every restart.
 */

import { Account, AccountStatus, AccountType } from '../domain/account';

export const SEED_ACCOUNTS: readonly Account[] = [
  {
    id: 1,
    firstName: 'John',
    lastName: 'Doe',
    email: 'john.doe@example.com',
    accountType: AccountType.Premium,
    department: 'Sales',
    status: AccountStatus.Active,
    createdDate: '2024-01-15',
    balance: 15750.0,
  },
  {
    id: 2,
    firstName: 'Sarah',
    lastName: 'Johnson',
    email: 'sarah.j@example.com',
    accountType: AccountType.Standard,
    department: 'Marketing',
    status: AccountStatus.Active,
    createdDate: '2024-02-20',
    balance: 8250.0,
  },
  {
    id: 3,
    firstName: 'Mike',
    lastName: 'Chen',
    email: 'mike.chen@example.com',
    accountType: AccountType.Basic,
    department: 'Support',
    status: AccountStatus.Inactive,
    createdDate: '2024-03-10',
    balance: 2100.0,
  },
];
