/**
 * Account input validator.
 *
 * Turns a raw AccountFormInput into typed fields, or into the ordered list
 * of every rule it breaks. A check that depends on an earlier one (email
 * format needs an email, uniqueness needs a well-formed email) is skipped
 * when that earlier check fails; all other checks always run.
 */

import {
  Account,
  AccountFormInput,
  AccountUpdateFields,
  MAX_BALANCE,
  NewAccountFields,
  isAccountStatus,
  isAccountType,
} from '../domain/account';
import { TypedError, fieldError } from '../domain/errors';

/** Validation result. */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: TypedError[] };

export type BalanceResult =
  | { ok: true; value: number }
  | { ok: false; error: TypedError };

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

/** Plain decimal or exponent notation, optional sign and surrounding blanks. */
const DECIMAL_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * Parse and range-check a balance. Missing input means zero. The accepted
 * value is rounded to cents, half away from zero on the binary value.
 */
export function validateBalance(raw: string | undefined): BalanceResult {
  const text = raw ?? '0';
  if (!DECIMAL_PATTERN.test(text)) {
    return { ok: false, error: fieldError('INVALID_BALANCE', 'balance', 'Invalid balance format') };
  }
  // Numerals past the double range parse to ±Infinity and fall to the range checks.
  const balance = Number(text);
  if (balance < 0) {
    return { ok: false, error: fieldError('NEGATIVE_BALANCE', 'balance', 'Balance cannot be negative') };
  }
  if (balance > MAX_BALANCE) {
    return { ok: false, error: fieldError('BALANCE_TOO_LARGE', 'balance', 'Balance too large') };
  }
  return { ok: true, value: roundToCents(balance) };
}

export function roundToCents(value: number): number {
  return Number(value.toFixed(2));
}

/** Validate a create request against the accounts that currently exist. */
export function validateCreateInput(
  input: AccountFormInput,
  existing: readonly Account[],
): ValidationResult<NewAccountFields> {
  const errors: TypedError[] = [];
  const profile = checkProfile(input, errors, (email) => existing.some((a) => a.email === email));

  const balance = validateBalance(input.balance);
  if (!balance.ok) errors.push(balance.error);

  if (!profile || !balance.ok || errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, value: { ...profile, balance: balance.value } };
}

/**
 * Validate an edit of account `id`. The account may keep its own email;
 * any other live account holding it is a conflict.
 */
export function validateEditInput(
  id: number,
  input: AccountFormInput,
  existing: readonly Account[],
): ValidationResult<AccountUpdateFields> {
  const errors: TypedError[] = [];
  const profile = checkProfile(input, errors, (email) => existing.some((a) => a.email === email && a.id !== id));

  const status = input.status ?? '';
  if (!isAccountStatus(status)) errors.push(fieldError('INVALID_ENUM', 'status', 'Valid status is required'));

  const balance = validateBalance(input.balance);
  if (!balance.ok) errors.push(balance.error);

  if (!profile || !isAccountStatus(status) || !balance.ok || errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, value: { ...profile, status, balance: balance.value } };
}

type ProfileFields = Omit<NewAccountFields, 'balance'>;

/**
 * Name, email, type and department checks shared by create and edit.
 * Returns the normalized fields, or null when any of them failed.
 */
function checkProfile(
  input: AccountFormInput,
  errors: TypedError[],
  emailTaken: (email: string) => boolean,
): ProfileFields | null {
  const before = errors.length;
  const firstName = (input.firstName ?? '').trim();
  const lastName = (input.lastName ?? '').trim();
  const email = (input.email ?? '').trim().toLowerCase();
  const accountType = input.accountType ?? '';
  const department = (input.department ?? '').trim();

  if (!firstName) errors.push(fieldError('REQUIRED_FIELD', 'firstName', 'First name is required'));
  if (!lastName) errors.push(fieldError('REQUIRED_FIELD', 'lastName', 'Last name is required'));

  if (!email) {
    errors.push(fieldError('REQUIRED_FIELD', 'email', 'Email is required'));
  } else if (!validateEmail(email)) {
    errors.push(fieldError('INVALID_EMAIL', 'email', 'Invalid email format'));
  } else if (emailTaken(email)) {
    errors.push(fieldError('DUPLICATE_EMAIL', 'email', 'Email already exists'));
  }

  if (!isAccountType(accountType)) {
    errors.push(fieldError('INVALID_ENUM', 'accountType', 'Valid account type is required'));
  }

  if (!department) errors.push(fieldError('REQUIRED_FIELD', 'department', 'Department is required'));

  if (errors.length > before || !isAccountType(accountType)) return null;
  return { firstName, lastName, email, accountType, department };
}
