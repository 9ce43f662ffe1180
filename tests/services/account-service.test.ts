import { AccountService } from '../../src/services/account-service';
import { createMemoryStore } from '../../src/storage/memory-store';
import { SEED_ACCOUNTS } from '../../src/storage/seed';
import { AccountFormInput, AccountStatus } from '../../src/domain/account';
import { LogEntry, configureLogger, resetLogger } from '../../src/logger';

const clock = () => new Date(2026, 9, 18);

const form: AccountFormInput = {
  firstName: 'Jane',
  lastName: 'Roe',
  email: 'Jane.Roe@example.com',
  accountType: 'premium',
  department: 'Finance',
  balance: '500',
};

describe('AccountService', () => {
  let service: AccountService;
  let logs: LogEntry[];

  beforeEach(() => {
    service = new AccountService(createMemoryStore({ seed: SEED_ACCOUNTS, clock }));
    logs = [];
    configureLogger({ handler: (entry) => logs.push(entry) });
  });

  afterAll(() => {
    resetLogger();
  });

  test('create round-trips through get', async () => {
    const result = await service.create(form);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    expect(await service.get(result.account.id)).toEqual({
      id: 4,
      firstName: 'Jane',
      lastName: 'Roe',
      email: 'jane.roe@example.com',
      accountType: 'premium',
      department: 'Finance',
      status: AccountStatus.Active,
      createdDate: '2026-10-18',
      balance: 500,
    });
    expect(logs.map((l) => l.message)).toEqual(['Account created']);
    expect(logs[0].context).toEqual({ component: 'account-desk', service: 'accounts', accountId: 4 });
  });

  test('create reports every validation error without writing', async () => {
    const result = await service.create({ email: 'bad' });
    expect(result.status).toBe('invalid');
    if (result.status === 'invalid') {
      expect(result.errors.map((e) => e.message)).toEqual([
        'First name is required',
        'Last name is required',
        'Invalid email format',
        'Valid account type is required',
        'Department is required',
      ]);
    }
    expect(await service.count()).toBe(3);
  });

  test('concurrent creates with the same email admit exactly one', async () => {
    const [first, second] = await Promise.all([service.create(form), service.create(form)]);
    expect(first.status).toBe('ok');
    expect(second).toEqual({
      status: 'invalid',
      errors: [expect.objectContaining({ message: 'Email already exists' })],
    });
    expect(await service.count()).toBe(4);
  });

  test('a deleted account frees its email', async () => {
    await service.delete(1);
    const result = await service.create({ ...form, email: 'john.doe@example.com' });
    expect(result.status).toBe('ok');
  });

  test('update changes fields and keeps createdDate', async () => {
    const result = await service.update(3, { ...form, email: 'mike.chen@example.com', status: 'active' });
    expect(result.status).toBe('ok');
    const account = await service.get(3);
    expect(account?.status).toBe(AccountStatus.Active);
    expect(account?.createdDate).toBe('2024-03-10');
    expect(account?.firstName).toBe('Jane');
  });

  test("update rejects another account's email", async () => {
    const result = await service.update(1, { ...form, email: 'sarah.j@example.com', status: 'active' });
    expect(result.status).toBe('invalid');
    if (result.status === 'invalid') {
      expect(result.errors.map((e) => e.message)).toEqual(['Email already exists']);
    }
  });

  test('update of an unknown id reports not_found before validating', async () => {
    expect(await service.update(42, {})).toEqual({ status: 'not_found' });
  });

  test('delete returns the removed account', async () => {
    const result = await service.delete(2);
    expect(result.status).toBe('ok');
    if (result.status === 'ok') expect(result.account.email).toBe('sarah.j@example.com');
    expect(await service.get(2)).toBeNull();
  });

  test('delete of an unknown id leaves the store unchanged', async () => {
    const before = await service.list();
    expect(await service.delete(42)).toEqual({ status: 'not_found' });
    expect(await service.list()).toEqual(before);
  });

  test('list applies filters', async () => {
    const accounts = await service.list({ status: 'inactive' });
    expect(accounts.map((a) => a.id)).toEqual([3]);
  });

  test('stats and recent reflect mutations immediately', async () => {
    await service.create(form);
    const stats = await service.stats();
    expect(stats.total).toBe(4);
    expect(stats.active).toBe(3);
    expect(stats.totalBalance).toBe(26600);
    expect(stats.averageBalance).toBe(6650);
    expect((await service.recent()).map((a) => a.id)).toEqual([4, 3, 2, 1]);
  });
});
