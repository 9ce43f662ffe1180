import { escapeHtml, formatMoney, renderAccountForm, renderNotices } from '../../src/web/views';
import { SEED_ACCOUNTS } from '../../src/storage/seed';

describe('escapeHtml', () => {
  test('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('formatMoney', () => {
  test.each([
    [0, '$0.00'],
    [2100, '$2,100.00'],
    [1200.5, '$1,200.50'],
    [1000000, '$1,000,000.00'],
  ])('%d → %s', (amount, expected) => {
    expect(formatMoney(amount)).toBe(expected);
  });
});

describe('renderNotices', () => {
  test('renders nothing without notices', () => {
    expect(renderNotices([])).toBe('');
  });

  test('renders one item per notice', () => {
    expect(renderNotices([{ level: 'error', message: 'A & B' }])).toBe(
      '<ul class="notices">\n<li class="notice notice-error">A &amp; B</li>\n</ul>',
    );
  });
});

describe('renderAccountForm', () => {
  test('edit mode posts to the edit route and includes the status field', () => {
    const account = SEED_ACCOUNTS[2];
    const html = renderAccountForm({ kind: 'edit', account }, { status: 'inactive' });
    expect(html).toContain('<h1>Edit Mike Chen</h1>');
    expect(html).toContain('<form method="post" action="/account/3/edit">');
    expect(html).toContain('<option value="inactive" selected>Inactive</option>');
  });
});
