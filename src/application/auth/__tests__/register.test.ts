import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { Password } from '../../../domain/auth/password.js';
import { WeakCredentialError } from '../../../domain/auth/errors.js';
import { ConflictError } from '../../errors.js';
import { InMemoryUnitOfWork } from '../../../test-support/inMemoryUnitOfWork.js';
import { silentLogger } from '../../../test-support/testApp.js';

describe('RegisterUseCase', () => {
  let uow: InMemoryUnitOfWork;
  let useCase: RegisterUseCase;

  beforeEach(() => {
    uow = new InMemoryUnitOfWork();
    useCase = new RegisterUseCase(uow, silentLogger());
  });

  it('should create a user and return it without the hash', async () => {
    const result = await useCase.execute({
      username: 'alice',
      email: 'A@X.com',
      password: 'pw12345',
    });

    expect(result.username).toBe('alice');
    expect(result.email).toBe('a@x.com');
    expect(result.createdAt).toBeInstanceOf(Date);
    expect(Object.keys(result).sort()).toEqual(['createdAt', 'email', 'id', 'username']);
  });

  it('should store an argon2 hash that verifies the password', async () => {
    const result = await useCase.execute({
      username: 'alice',
      email: 'a@x.com',
      password: 'pw12345',
    });

    const stored = uow.snapshot().users.get(result.id);
    expect(stored?.passwordHash).toBeDefined();
    expect(stored?.passwordHash).not.toBe('pw12345');
    expect(await Password.verify('pw12345', stored?.passwordHash ?? '')).toBe(true);
  });

  it('should reject a weak password before touching the store', async () => {
    await expect(
      useCase.execute({ username: 'alice', email: 'a@x.com', password: 'abc' })
    ).rejects.toThrow(WeakCredentialError);

    expect(uow.snapshot().users.size).toBe(0);
    expect(uow.commits).toBe(0);
    expect(uow.rollbacks).toBe(0);
  });

  it('should reject a taken username and roll back', async () => {
    await useCase.execute({ username: 'alice', email: 'a@x.com', password: 'pw12345' });

    await expect(
      useCase.execute({ username: 'alice', email: 'other@x.com', password: 'pw12345' })
    ).rejects.toThrow(new ConflictError('Username already registered'));

    expect(uow.rollbacks).toBe(1);
    expect(uow.snapshot().users.size).toBe(1);
  });

  it('should reject a taken email regardless of case', async () => {
    await useCase.execute({ username: 'alice', email: 'a@x.com', password: 'pw12345' });

    await expect(
      useCase.execute({ username: 'bob', email: 'A@X.COM', password: 'pw12345' })
    ).rejects.toThrow('Email already registered');
  });

  it('should keep users and admins apart', async () => {
    const admins = new RegisterUseCase(uow, silentLogger(), 'admin');
    await useCase.execute({ username: 'alice', email: 'a@x.com', password: 'pw12345' });

    const admin = await admins.execute({
      username: 'alice',
      email: 'a@x.com',
      password: 'pw12345',
    });

    expect(uow.snapshot().admins.get(admin.id)?.username).toBe('alice');
    expect(uow.snapshot().users.has(admin.id)).toBe(false);
  });
});
