import { JsonStore } from '../storage/json-store';
import { PublicUser, Role, UserRecord } from '../types/entry-pass.types';
import { ConflictError } from '../errors';

function sameUsername(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function toPublicUser(user: UserRecord): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export class UserModel {
  constructor(private readonly store: JsonStore) {}

  async findAll(): Promise<UserRecord[]> {
    return this.store.read('users');
  }

  async findByRole(role: Role): Promise<UserRecord[]> {
    const users = await this.findAll();
    return users.filter((user) => user.role === role);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const users = await this.findAll();
    return users.find((user) => sameUsername(user.username, username)) ?? null;
  }

  async create(user: UserRecord): Promise<UserRecord> {
    return this.store.update('users', (users) => {
      if (users.some((existing) => sameUsername(existing.username, user.username))) {
        throw new ConflictError(`Username ${user.username} already exists`, 'USERNAME_TAKEN');
      }
      return { items: [...users, user], result: user };
    });
  }

  async deleteById(id: string): Promise<boolean> {
    return this.store.update('users', (users) => {
      const remaining = users.filter((user) => user.id !== id);
      return { items: remaining, result: remaining.length !== users.length };
    });
  }

  // Returns the number of accounts removed
  async deleteByRole(role: Role): Promise<number> {
    return this.store.update('users', (users) => {
      const remaining = users.filter((user) => user.role !== role);
      return { items: remaining, result: users.length - remaining.length };
    });
  }
}
