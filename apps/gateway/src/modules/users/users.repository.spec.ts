import { DatabaseError, Pool } from 'pg';
import { CredentialStoreError, DuplicateIdentityError } from '../auth/auth.errors';
import { UsersRepository } from './users.repository';

const ID = '3f1c2a4e-8b7d-4c21-9a3e-5d6f7a8b9c0d';

const row = {
  id: ID,
  name: 'Demo User',
  email: 'demo@example.com',
  password_hash: '$2b$04$abcdefghijklmnopqrstuuABCDEFGHIJKLMNOPQRSTUVWXYZ01234',
  role: 'user',
  is_active: true,
  created_at: new Date('2026-01-01T00:00:00Z'),
  updated_at: new Date('2026-01-01T00:00:00Z'),
};

describe('UsersRepository', () => {
  const query = jest.fn();
  const repo = new UsersRepository({ query } as unknown as Pool);

  beforeEach(() => query.mockReset());

  it('findByLoginIdentifier: maps a row to a credential', async () => {
    query.mockResolvedValue({ rows: [row] });

    const found = await repo.findByLoginIdentifier('demo@example.com');

    expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE email = $1'), [
      'demo@example.com',
    ]);
    expect(found).toEqual({
      id: ID,
      name: 'Demo User',
      email: 'demo@example.com',
      passwordHash: row.password_hash,
      role: 'user',
      isActive: true,
      createdAt: row.created_at,
    });
  });

  it('findByLoginIdentifier: null when no row matches', async () => {
    query.mockResolvedValue({ rows: [] });

    await expect(repo.findByLoginIdentifier('nobody@example.com')).resolves.toBeNull();
  });

  it('findByIdentity: a non-UUID id matches nothing and skips the query', async () => {
    await expect(repo.findByIdentity('not-a-uuid')).resolves.toBeNull();
    expect(query).not.toHaveBeenCalled();
  });

  it('wraps driver failures once, without retrying', async () => {
    query.mockRejectedValue(new Error('Query read timeout'));

    const err: unknown = await repo.findByIdentity(ID).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialStoreError);
    expect(err instanceof CredentialStoreError && err.kind).toBe('CredentialStoreFailure');
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('create: a unique violation becomes DuplicateIdentity', async () => {
    const violation = new DatabaseError('duplicate key value', 0, 'error');
    violation.code = '23505';
    query.mockRejectedValue(violation);

    await expect(
      repo.create({ name: 'Demo User', email: 'demo@example.com', passwordHash: row.password_hash }),
    ).rejects.toBeInstanceOf(DuplicateIdentityError);
  });

  it('create: returns the inserted credential', async () => {
    query.mockResolvedValue({ rows: [row] });

    const created = await repo.create({
      name: 'Demo User',
      email: 'demo@example.com',
      passwordHash: row.password_hash,
    });

    expect(created.id).toBe(ID);
    expect(query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO users'), [
      'Demo User',
      'demo@example.com',
      row.password_hash,
    ]);
  });
});
