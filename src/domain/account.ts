/**
 * Account domain model.
 *
 * An account is a customer record with a tier, an owning department,
 * an activity status and a balance.
 */

export interface Account {
  /** Store-assigned, never reused after deletion. */
  id: number;
  firstName: string;
  lastName: string;
  /** Always stored lower-cased; unique among live accounts. */
  email: string;
  accountType: AccountType;
  department: string;
  status: AccountStatus;
  /** Local calendar date of creation, `YYYY-MM-DD`. Never changes. */
  createdDate: string;
  /** Between 0 and MAX_BALANCE, rounded to cents. */
  balance: number;
}

export enum AccountType {
  Basic = 'basic',
  Standard = 'standard',
  Premium = 'premium',
}

export enum AccountStatus {
  Active = 'active',
  Inactive = 'inactive',
}

export const ACCOUNT_TYPES: readonly AccountType[] = [AccountType.Basic, AccountType.Standard, AccountType.Premium];

export const ACCOUNT_STATUSES: readonly AccountStatus[] = [AccountStatus.Active, AccountStatus.Inactive];

export const MAX_BALANCE = 1_000_000;

/**
 * Raw create/edit payload as submitted by a form or client.
 * Nothing here is trusted until it passes the validator.
 */
export interface AccountFormInput {
  firstName?: string;
  lastName?: string;
  email?: string;
  accountType?: string;
  department?: string;
  /** Only read by the edit flow. */
  status?: string;
  balance?: string;
}

/** Validated fields for a new account; the store fills in the rest. */
export interface NewAccountFields {
  firstName: string;
  lastName: string;
  email: string;
  accountType: AccountType;
  department: string;
  balance: number;
}

/** Validated replacement for every mutable field of an existing account. */
export interface AccountUpdateFields extends NewAccountFields {
  status: AccountStatus;
}

/**
 * List filter. Each present field must equal the record's value exactly;
 * an unknown value therefore matches nothing.
 */
export interface AccountFilter {
  accountType?: string;
  status?: string;
}

export function isAccountType(value: string): value is AccountType {
  return ACCOUNT_TYPES.some((type) => type === value);
}

export function isAccountStatus(value: string): value is AccountStatus {
  return ACCOUNT_STATUSES.some((status) => status === value);
}

export function fullName(account: Pick<Account, 'firstName' | 'lastName'>): string {
  return `${account.firstName} ${account.lastName}`;
}
