import * as bcrypt from 'bcrypt';

export interface CredentialHolder {
  passwordHash: string | null;
}

export async function hashPassword(plain: string, rounds: number): Promise<string> {
  return bcrypt.hash(plain, rounds);
}

// Reading a credential that was never assigned is a programming error.
export function requirePasswordHash(holder: CredentialHolder): string {
  if (!holder.passwordHash) {
    throw new Error('Password is not set for this record');
  }
  return holder.passwordHash;
}

export async function checkPassword(holder: CredentialHolder, plain: string): Promise<boolean> {
  return bcrypt.compare(plain, requirePasswordHash(holder));
}
