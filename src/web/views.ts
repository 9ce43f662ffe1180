/**
 * HTML views.
 *
 * Plain template functions; every interpolated value goes through
 * escapeHtml unless it is markup produced by another view function.
 */

import {
  Account,
  AccountFormInput,
  ACCOUNT_STATUSES,
  ACCOUNT_TYPES,
  fullName,
} from '../domain/account';
import { DashboardStats } from '../stats/dashboard-stats';
import { FlashMessage } from './flash';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatMoney(amount: number): string {
  return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function renderNotices(messages: readonly FlashMessage[]): string {
  if (messages.length === 0) return '';
  const items = messages
    .map((m) => `<li class="notice notice-${m.level}">${escapeHtml(m.message)}</li>`)
    .join('\n');
  return `<ul class="notices">\n${items}\n</ul>`;
}

export function renderLayout(title: string, body: string, notices: readonly FlashMessage[] = []): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Account Desk</title>
</head>
<body>
<nav><a href="/">Dashboard</a> <a href="/accounts">Accounts</a> <a href="/account/create">New account</a></nav>
<main>
${renderNotices(notices)}
${body}
</main>
</body>
</html>`;
}

function accountRow(account: Account): string {
  return `<tr>
<td><a href="/account/${account.id}">${escapeHtml(fullName(account))}</a></td>
<td>${escapeHtml(account.email)}</td>
<td>${capitalize(account.accountType)}</td>
<td>${escapeHtml(account.department)}</td>
<td>${capitalize(account.status)}</td>
<td>${formatMoney(account.balance)}</td>
</tr>`;
}

function accountTable(accounts: readonly Account[]): string {
  if (accounts.length === 0) return '<p class="empty">No accounts found.</p>';
  return `<table>
<thead><tr><th>Name</th><th>Email</th><th>Type</th><th>Department</th><th>Status</th><th>Balance</th></tr></thead>
<tbody>
${accounts.map(accountRow).join('\n')}
</tbody>
</table>`;
}

export function renderDashboard(
  stats: DashboardStats,
  recent: readonly Account[],
  notices: readonly FlashMessage[] = [],
): string {
  const body = `<h1>Dashboard</h1>
<dl class="stats">
<dt>Total accounts</dt><dd id="stat-total">${stats.total}</dd>
<dt>Active</dt><dd id="stat-active">${stats.active}</dd>
<dt>Inactive</dt><dd id="stat-inactive">${stats.inactive}</dd>
<dt>Total balance</dt><dd id="stat-total-balance">${formatMoney(stats.totalBalance)}</dd>
<dt>Average balance</dt><dd id="stat-average-balance">${formatMoney(stats.averageBalance)}</dd>
</dl>
<h2>Recent accounts</h2>
${accountTable(recent)}`;
  return renderLayout('Dashboard', body, notices);
}

function filterOptions(values: readonly string[], selected: string, anyLabel: string): string {
  const options = [`<option value=""${selected === '' ? ' selected' : ''}>${anyLabel}</option>`];
  for (const value of values) {
    options.push(`<option value="${value}"${value === selected ? ' selected' : ''}>${capitalize(value)}</option>`);
  }
  return options.join('');
}

export function renderAccountList(
  accounts: readonly Account[],
  filter: { type: string; status: string },
  notices: readonly FlashMessage[] = [],
): string {
  const body = `<h1>Accounts</h1>
<form method="get" action="/accounts" class="filters">
<select name="type">${filterOptions(ACCOUNT_TYPES, filter.type, 'All types')}</select>
<select name="status">${filterOptions(ACCOUNT_STATUSES, filter.status, 'All statuses')}</select>
<button type="submit">Filter</button>
</form>
${accountTable(accounts)}`;
  return renderLayout('Accounts', body, notices);
}

export function renderAccountDetail(account: Account, notices: readonly FlashMessage[] = []): string {
  const body = `<h1>${escapeHtml(fullName(account))}</h1>
<dl class="account">
<dt>ID</dt><dd>${account.id}</dd>
<dt>Email</dt><dd>${escapeHtml(account.email)}</dd>
<dt>Type</dt><dd>${capitalize(account.accountType)}</dd>
<dt>Department</dt><dd>${escapeHtml(account.department)}</dd>
<dt>Status</dt><dd>${capitalize(account.status)}</dd>
<dt>Created</dt><dd>${account.createdDate}</dd>
<dt>Balance</dt><dd>${formatMoney(account.balance)}</dd>
</dl>
<a href="/account/${account.id}/edit">Edit</a>
<form method="post" action="/account/${account.id}/delete"><button type="submit">Delete</button></form>`;
  return renderLayout(fullName(account), body, notices);
}

/** Prefill values for the account form, as strings exactly as displayed. */
export function formValuesFromAccount(account: Account): AccountFormInput {
  return {
    firstName: account.firstName,
    lastName: account.lastName,
    email: account.email,
    accountType: account.accountType,
    department: account.department,
    status: account.status,
    balance: account.balance.toFixed(2),
  };
}

function textInput(name: string, label: string, value: string | undefined, type = 'text', attrs = ''): string {
  return `<label>${label} <input type="${type}" name="${name}" value="${escapeHtml(value ?? '')}"${attrs}></label>`;
}

function selectInput(name: string, label: string, values: readonly string[], selected: string | undefined): string {
  const options = values
    .map((v) => `<option value="${v}"${v === selected ? ' selected' : ''}>${capitalize(v)}</option>`)
    .join('');
  return `<label>${label} <select name="${name}"><option value="">Select…</option>${options}</select></label>`;
}

export type AccountFormMode = { kind: 'create' } | { kind: 'edit'; account: Account };

export function renderAccountForm(
  mode: AccountFormMode,
  values: AccountFormInput,
  errors: readonly string[] = [],
  notices: readonly FlashMessage[] = [],
): string {
  const action = mode.kind === 'create' ? '/account/create' : `/account/${mode.account.id}/edit`;
  const title = mode.kind === 'create' ? 'Create account' : `Edit ${fullName(mode.account)}`;
  const errorList =
    errors.length > 0
      ? `<ul class="errors">\n${errors.map((e) => `<li>${escapeHtml(e)}</li>`).join('\n')}\n</ul>`
      : '';
  const fields = [
    textInput('first_name', 'First name', values.firstName),
    textInput('last_name', 'Last name', values.lastName),
    textInput('email', 'Email', values.email, 'email'),
    selectInput('account_type', 'Account type', ACCOUNT_TYPES, values.accountType),
    textInput('department', 'Department', values.department),
  ];
  if (mode.kind === 'edit') {
    fields.push(selectInput('status', 'Status', ACCOUNT_STATUSES, values.status));
  }
  fields.push(textInput('balance', 'Balance', values.balance, 'number', ' step="0.01" min="0"'));

  const body = `<h1>${escapeHtml(title)}</h1>
${errorList}
<form method="post" action="${action}">
${fields.join('\n')}
<button type="submit">Save</button>
</form>`;
  return renderLayout(title, body, notices);
}

export function renderErrorPage(status: number, message: string): string {
  return renderLayout(
    `Error ${status}`,
    `<h1>${status}</h1>\n<p class="error-message">${escapeHtml(message)}</p>\n<a href="/">Back to dashboard</a>`,
  );
}
