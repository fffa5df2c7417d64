import { checkPassword, hashPassword, requirePasswordHash } from './credentials.util';

jest.mock('bcrypt', () => ({
  hash: jest.fn(async (plain: string, rounds: number) => `hashed:${rounds}:${plain}`),
  compare: jest.fn(async (plain: string, hash: string) => hash.endsWith(`:${plain}`)),
}));

describe('credentials', () => {
  it('hashes with the configured rounds', async () => {
    await expect(hashPassword('test-secret', 4)).resolves.toBe('hashed:4:test-secret');
  });

  it('compares a plain password against the stored hash', async () => {
    const holder = { passwordHash: 'hashed:4:test-secret' };
    await expect(checkPassword(holder, 'test-secret')).resolves.toBe(true);
    await expect(checkPassword(holder, 'wrong')).resolves.toBe(false);
  });

  it('refuses to read a credential that was never set', () => {
    expect(() => requirePasswordHash({ passwordHash: null })).toThrow('Password is not set for this record');
  });
});
