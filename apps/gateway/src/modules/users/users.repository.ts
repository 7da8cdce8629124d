// src/modules/users/users.repository.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { DatabaseError, Pool } from 'pg';
import { z } from 'zod';
import { DATABASE_POOL } from '../infra/database/database.module';
import { CredentialStoreError, DuplicateIdentityError } from '../auth/auth.errors';
import { Credential, CredentialStore, NewCredential } from './credential-store';
import { UserRow, UserRowSchema } from './user.zod';

const USER_COLUMNS = 'id, name, email, password_hash, role, is_active, created_at, updated_at';
const UNIQUE_VIOLATION = '23505';

function toCredential(raw: unknown): Credential {
  const row: UserRow = UserRowSchema.parse(raw);
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

/** Postgres-backed credential store. Failures are wrapped and never retried. */
@Injectable()
export class UsersRepository implements CredentialStore {
  private readonly logger = new Logger(UsersRepository.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}

  async findByLoginIdentifier(email: string): Promise<Credential | null> {
    const sql = `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE email = $1
      LIMIT 1
    `;
    return this.findOne('findByLoginIdentifier', sql, [email]);
  }

  async findByIdentity(id: string): Promise<Credential | null> {
    // a non-UUID id would make postgres raise 22P02; it simply matches nothing
    if (!z.uuid().safeParse(id).success) return null;

    const sql = `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE id = $1
      LIMIT 1
    `;
    return this.findOne('findByIdentity', sql, [id]);
  }

  async create(input: NewCredential): Promise<Credential> {
    const sql = `
      INSERT INTO users (name, email, password_hash)
      VALUES ($1, $2, $3)
      RETURNING ${USER_COLUMNS}
    `;
    try {
      const result = await this.pool.query(sql, [input.name, input.email, input.passwordHash]);
      return toCredential(result.rows[0]);
    } catch (err) {
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
        throw new DuplicateIdentityError();
      }
      this.logger.error('create failed', err instanceof Error ? err.stack : String(err));
      throw new CredentialStoreError('create', err);
    }
  }

  private async findOne(operation: string, sql: string, params: unknown[]): Promise<Credential | null> {
    try {
      const result = await this.pool.query(sql, params);
      return result.rows.length > 0 ? toCredential(result.rows[0]) : null;
    } catch (err) {
      this.logger.error(`${operation} failed`, err instanceof Error ? err.stack : String(err));
      throw new CredentialStoreError(operation, err);
    }
  }
}
