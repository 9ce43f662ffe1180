import express from 'express';
import { createApp, createAppContext } from '../../src/server';
import { TEST_CONFIG, fixedClock, request } from '../helpers/http';

const validForm = {
  first_name: 'Jane',
  last_name: 'Roe',
  email: 'Jane.Roe@Example.com',
  account_type: 'standard',
  department: 'Finance',
  balance: '1200.50',
};

async function fetchJson(app: express.Application, path: string) {
  return JSON.parse((await request(app, 'GET', path)).text);
}

describe('Account pages', () => {
  let app: express.Application;

  beforeEach(() => {
    app = createApp(createAppContext({ config: TEST_CONFIG, clock: fixedClock }));
  });

  test('dashboard shows stats and newest accounts first', async () => {
    const res = await request(app, 'GET', '/');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(res.text).toContain('<dd id="stat-total">3</dd>');
    expect(res.text).toContain('<dd id="stat-active">2</dd>');
    expect(res.text).toContain('<dd id="stat-inactive">1</dd>');
    expect(res.text).toContain('<dd id="stat-total-balance">$26,100.00</dd>');
    expect(res.text).toContain('<dd id="stat-average-balance">$8,700.00</dd>');

    const mike = res.text.indexOf('mike.chen@example.com');
    const sarah = res.text.indexOf('sarah.j@example.com');
    const john = res.text.indexOf('john.doe@example.com');
    expect(mike).toBeGreaterThan(-1);
    expect(mike).toBeLessThan(sarah);
    expect(sarah).toBeLessThan(john);
  });

  test('account list applies type and status filters', async () => {
    const res = await request(app, 'GET', '/accounts?type=premium&status=active');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<td><a href="/account/1">John Doe</a></td>');
    expect(res.text).not.toContain('href="/account/2"');
    expect(res.text).not.toContain('href="/account/3"');
    expect(res.text).toContain('<option value="premium" selected>Premium</option>');
  });

  test('empty filter parameters impose no constraint', async () => {
    const res = await request(app, 'GET', '/accounts?type=&status=');
    expect(res.text).toContain('href="/account/1"');
    expect(res.text).toContain('href="/account/2"');
    expect(res.text).toContain('href="/account/3"');
  });

  test('a filter that matches nothing renders the empty state', async () => {
    const res = await request(app, 'GET', '/accounts?status=inactive&type=premium');
    expect(res.text).toContain('<p class="empty">No accounts found.</p>');
  });

  test('account detail renders the record', async () => {
    const res = await request(app, 'GET', '/account/3');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<h1>Mike Chen</h1>');
    expect(res.text).toContain('<dt>Created</dt><dd>2024-03-10</dd>');
    expect(res.text).toContain('<dt>Balance</dt><dd>$2,100.00</dd>');
  });

  test('a missing account redirects to the list with an error notice', async () => {
    const res = await request(app, 'GET', '/account/99');
    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toBe('/accounts');
    expect(res.flashCookie).toBeDefined();

    const list = await request(app, 'GET', '/accounts', { cookie: res.flashCookie });
    expect(list.text).toContain('<li class="notice notice-error">Account not found</li>');

    const again = await request(app, 'GET', '/accounts');
    expect(again.text).not.toContain('class="notices"');
  });

  test('a forged notice cookie is ignored', async () => {
    const payload = Buffer.from(JSON.stringify([{ level: 'error', message: 'forged' }])).toString('base64url');
    const res = await request(app, 'GET', '/accounts', { cookie: `flash=${payload}.bogus` });
    expect(res.status).toBe(200);
    expect(res.text).not.toContain('forged');
  });

  test('create form renders empty', async () => {
    const res = await request(app, 'GET', '/account/create');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<form method="post" action="/account/create">');
    expect(res.text).toContain('<input type="text" name="first_name" value="">');
    expect(res.text).not.toContain('name="status"');
  });

  test('creating an account redirects to its detail page with a success notice', async () => {
    const res = await request(app, 'POST', '/account/create', { form: validForm });
    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toBe('/account/4');

    const detail = await request(app, 'GET', '/account/4', { cookie: res.flashCookie });
    expect(detail.text).toContain('<li class="notice notice-success">Account created successfully for Jane Roe!</li>');

    const body = await fetchJson(app, '/api/account/4');
    expect(body.account).toEqual({
      id: 4,
      first_name: 'Jane',
      last_name: 'Roe',
      email: 'jane.roe@example.com',
      account_type: 'standard',
      department: 'Finance',
      status: 'active',
      created_date: '2026-10-18',
      balance: 1200.5,
    });
  });

  test('invalid create input re-renders the form with every error and the submitted values', async () => {
    const res = await request(app, 'POST', '/account/create', {
      form: {
        first_name: '',
        last_name: 'Roe',
        email: 'not-an-email',
        account_type: 'gold',
        department: ' ',
        balance: '-5',
      },
    });
    expect(res.status).toBe(200);
    expect(res.text).toContain(
      [
        '<ul class="errors">',
        '<li>First name is required</li>',
        '<li>Invalid email format</li>',
        '<li>Valid account type is required</li>',
        '<li>Department is required</li>',
        '<li>Balance cannot be negative</li>',
        '</ul>',
      ].join('\n'),
    );
    expect(res.text).toContain('<input type="email" name="email" value="not-an-email">');
    expect((await fetchJson(app, '/api/accounts')).count).toBe(3);
  });

  test('submitted values are escaped when re-rendered', async () => {
    const res = await request(app, 'POST', '/account/create', {
      form: { ...validForm, first_name: '<b>"Jo"</b>', email: 'john.doe@example.com' },
    });
    expect(res.text).toContain('<li>Email already exists</li>');
    expect(res.text).toContain('value="&lt;b&gt;&quot;Jo&quot;&lt;/b&gt;"');
  });

  test('edit form is prefilled', async () => {
    const res = await request(app, 'GET', '/account/2/edit');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<form method="post" action="/account/2/edit">');
    expect(res.text).toContain('<input type="email" name="email" value="sarah.j@example.com">');
    expect(res.text).toContain('<option value="active" selected>Active</option>');
    expect(res.text).toContain('<input type="number" name="balance" value="8250.00" step="0.01" min="0">');
  });

  test('editing a missing account redirects with an error notice', async () => {
    const page = await request(app, 'GET', '/account/99/edit');
    expect(page.status).toBe(302);
    expect(page.headers.get('location')).toBe('/accounts');

    const submit = await request(app, 'POST', '/account/99/edit', { form: { ...validForm, status: 'active' } });
    expect(submit.status).toBe(302);
    expect(submit.headers.get('location')).toBe('/accounts');
  });

  test("editing to another account's email fails; keeping one's own succeeds", async () => {
    const clash = await request(app, 'POST', '/account/1/edit', {
      form: { ...validForm, email: 'sarah.j@example.com', status: 'active' },
    });
    expect(clash.status).toBe(200);
    expect(clash.text).toContain('<ul class="errors">\n<li>Email already exists</li>\n</ul>');

    const own = await request(app, 'POST', '/account/1/edit', {
      form: { ...validForm, email: 'john.doe@example.com', status: 'inactive' },
    });
    expect(own.status).toBe(302);
    expect(own.headers.get('location')).toBe('/account/1');

    const detail = await request(app, 'GET', '/account/1', { cookie: own.flashCookie });
    expect(detail.text).toContain('<li class="notice notice-success">Account updated successfully for Jane Roe!</li>');

    const body = await fetchJson(app, '/api/account/1');
    expect(body.account.status).toBe('inactive');
    expect(body.account.created_date).toBe('2024-01-15');
  });

  test('edit requires a valid status', async () => {
    const res = await request(app, 'POST', '/account/2/edit', {
      form: { ...validForm, email: 'sarah.j@example.com', status: '' },
    });
    expect(res.status).toBe(200);
    expect(res.text).toContain('<ul class="errors">\n<li>Valid status is required</li>\n</ul>');
  });

  test('deleting an account redirects to the list with a success notice', async () => {
    const res = await request(app, 'POST', '/account/2/delete');
    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toBe('/accounts');

    const list = await request(app, 'GET', '/accounts', { cookie: res.flashCookie });
    expect(list.text).toContain(
      '<li class="notice notice-success">Account for Sarah Johnson has been deleted successfully</li>',
    );
    expect(list.text).not.toContain('href="/account/2"');
    expect((await request(app, 'GET', '/api/account/2')).status).toBe(404);
  });

  test('deleting a missing account changes nothing and reports not found', async () => {
    const res = await request(app, 'POST', '/account/99/delete');
    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toBe('/accounts');

    const list = await request(app, 'GET', '/accounts', { cookie: res.flashCookie });
    expect(list.text).toContain('<li class="notice notice-error">Account not found</li>');
    expect((await fetchJson(app, '/api/accounts')).count).toBe(3);
  });

  test('ids keep increasing after a delete', async () => {
    await request(app, 'POST', '/account/3/delete');
    const res = await request(app, 'POST', '/account/create', { form: validForm });
    expect(res.headers.get('location')).toBe('/account/4');
    await request(app, 'POST', '/account/4/delete');
    const next = await request(app, 'POST', '/account/create', { form: validForm });
    expect(next.headers.get('location')).toBe('/account/5');
  });

  test('unknown pages render a 404 error page', async () => {
    const res = await request(app, 'GET', '/account/abc');
    expect(res.status).toBe(404);
    expect(res.text).toContain('<h1>404</h1>');
    expect(res.text).toContain('<p class="error-message">Page not found</p>');
  });
});
