import argon2 from 'argon2'
import { randomBytes } from 'node:crypto'

/**
 * Hash a password using Argon2id
 *
 * OWASP recommended parameters:
 * - memoryCost: 19456 KiB (19 MiB)
 * - timeCost: 2 iterations
 * - parallelism: 1
 */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 19456,
    timeCost: 2,
    parallelism: 1,
  })
}

/**
 * Verify a password against an Argon2id hash
 *
 * Returns false for any error (invalid hash format, wrong password, etc.)
 */
export async function verifyPassword(hash: string, password: string): Promise<boolean> {
  try {
    return await argon2.verify(hash, password)
  } catch {
    return false
  }
}

let dummyHash: Promise<string> | undefined

/**
 * A real Argon2id hash of a random value, computed once per process.
 *
 * Verified against when an account does not exist, so an unknown username
 * costs the same as a wrong password.
 */
export function getDummyHash(): Promise<string> {
  dummyHash ??= hashPassword(randomBytes(32).toString('hex'))
  return dummyHash
}
