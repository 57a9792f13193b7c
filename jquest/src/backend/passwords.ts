import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

const derive = (password: string, salt: string, keylen: number) =>
  new Promise<Buffer>((resolve, reject) =>
    scrypt(password, salt, keylen, (error, key) =>
      error ? reject(error) : resolve(key)
    )
  );

const KEY_LENGTH = 64;

/**
 * Stored as `scrypt$<salt>$<hash>`, both hex encoded
 */
export const hashPassword = async (password: string) => {
  const salt = randomBytes(16).toString("hex");
  const hash = await derive(password, salt, KEY_LENGTH);
  return `scrypt$${salt}$${hash.toString("hex")}`;
};

export const verifyPassword = async (password: string, stored: string) => {
  const [scheme, salt, hash] = stored.split("$");
  if (scheme !== "scrypt" || !salt || !hash) return false;

  const expected = Buffer.from(hash, "hex");
  if (expected.length === 0) return false;

  const actual = await derive(password, salt, expected.length);
  return timingSafeEqual(expected, actual);
};
