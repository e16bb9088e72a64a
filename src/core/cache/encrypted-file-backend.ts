/**
 * Encrypted-at-rest file backend
 *
 * One file per profile, AES-256-GCM with a fresh nonce per write and a key
 * derived from a passphrase with scrypt. The profile name is bound in as
 * additional authenticated data.
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
  scrypt,
  type ScryptOptions,
} from "node:crypto";
import { chmod, mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { CacheBackend } from "../../types/cache.js";
import { CacheCorruptionError } from "../errors.js";

const CIPHER = "aes-256-gcm";
const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const SALT_LENGTH = 16;
const FILE_PATTERN = /^[0-9a-f]{64}\.json$/;

/**
 * scrypt cost parameters
 */
export interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 2 ** 15, r: 8, p: 1 };

/** Upper bound on N accepted from a file, so a tampered file cannot stall us */
const MAX_SCRYPT_N = 2 ** 20;

const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/);

const encryptedFileSchema = z.object({
  version: z.literal(1),
  kdf: z.object({
    name: z.literal("scrypt"),
    N: z.number().int().min(2).max(MAX_SCRYPT_N),
    r: z.number().int().min(1).max(32),
    p: z.number().int().min(1).max(16),
    salt: base64,
  }),
  cipher: z.literal(CIPHER),
  nonce: base64,
  tag: base64,
  data: base64,
});

/**
 * Supplies the passphrase, or nothing when none can be had
 */
export type PassphraseProvider = () => Promise<string | undefined>;

/**
 * Options for the encrypted file backend
 */
export interface EncryptedFileBackendOptions {
  /** Directory holding the cache files */
  directory: string;

  passphrase: PassphraseProvider;

  /** scrypt cost for new writes */
  scryptParams?: ScryptParams;
}

function deriveKey(passphrase: string, salt: Buffer, params: ScryptParams): Promise<Buffer> {
  const options: ScryptOptions = {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 256 * params.N * params.r + 1024 * 1024,
  };

  return new Promise((resolve, reject) => {
    scrypt(passphrase, salt, KEY_LENGTH, options, (error, key) => {
      if (error) {
        reject(error);
      } else {
        resolve(key);
      }
    });
  });
}

/**
 * File name for a profile; hashing keeps arbitrary names filesystem-safe
 */
export function cacheFileName(profileName: string): string {
  return `${createHash("sha256").update(profileName, "utf-8").digest("hex")}.json`;
}

/**
 * CacheBackend storing encrypted files under a private directory
 */
export class EncryptedFileBackend implements CacheBackend {
  readonly location = "encrypted-file" as const;
  private readonly scryptParams: ScryptParams;

  constructor(private readonly options: EncryptedFileBackendOptions) {
    this.scryptParams = options.scryptParams ?? DEFAULT_SCRYPT_PARAMS;
  }

  /**
   * Available only when a passphrase can be obtained
   */
  async isAvailable(): Promise<boolean> {
    return (await this.options.passphrase()) !== undefined;
  }

  filePath(profileName: string): string {
    return join(this.options.directory, cacheFileName(profileName));
  }

  async read(profileName: string): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(profileName), "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    const passphrase = await this.requirePassphrase();
    return this.decrypt(profileName, raw, passphrase);
  }

  async write(profileName: string, payload: string): Promise<void> {
    const passphrase = await this.requirePassphrase();
    const salt = randomBytes(SALT_LENGTH);
    const nonce = randomBytes(NONCE_LENGTH);
    const key = await deriveKey(passphrase, salt, this.scryptParams);

    const cipher = createCipheriv(CIPHER, key, nonce);
    cipher.setAAD(Buffer.from(profileName, "utf-8"));
    const data = Buffer.concat([cipher.update(payload, "utf-8"), cipher.final()]);

    const document = {
      version: 1,
      kdf: { name: "scrypt", ...this.scryptParams, salt: salt.toString("base64") },
      cipher: CIPHER,
      nonce: nonce.toString("base64"),
      tag: cipher.getAuthTag().toString("base64"),
      data: data.toString("base64"),
    };

    await mkdir(this.options.directory, { recursive: true, mode: 0o700 });
    await chmod(this.options.directory, 0o700);

    const target = this.filePath(profileName);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(document), { mode: 0o600 });
    await rename(temp, target);
  }

  async remove(profileName: string): Promise<void> {
    await rm(this.filePath(profileName), { force: true });
  }

  async removeAll(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.options.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    await Promise.all(
      names
        .filter((name) => FILE_PATTERN.test(name))
        .map((name) => rm(join(this.options.directory, name), { force: true }))
    );
  }

  private async requirePassphrase(): Promise<string> {
    const passphrase = await this.options.passphrase();
    if (passphrase === undefined) {
      throw new Error("No cache passphrase available");
    }
    return passphrase;
  }

  private async decrypt(profileName: string, raw: string, passphrase: string): Promise<string> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptionError(`Cache file for '${profileName}' is not valid JSON`, undefined, {
        cause: error,
      });
    }

    const parsed = encryptedFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheCorruptionError(`Cache file for '${profileName}' has an unexpected shape`);
    }

    const { kdf, data } = parsed.data;
    const nonce = Buffer.from(parsed.data.nonce, "base64");
    const tag = Buffer.from(parsed.data.tag, "base64");
    if (nonce.length !== NONCE_LENGTH || tag.length !== 16) {
      throw new CacheCorruptionError(`Cache file for '${profileName}' has a bad nonce or tag`);
    }

    const key = await deriveKey(passphrase, Buffer.from(kdf.salt, "base64"), kdf);

    try {
      const decipher = createDecipheriv(CIPHER, key, nonce);
      decipher.setAAD(Buffer.from(profileName, "utf-8"));
      decipher.setAuthTag(tag);
      return Buffer.concat([
        decipher.update(Buffer.from(data, "base64")),
        decipher.final(),
      ]).toString("utf-8");
    } catch (error) {
      throw new CacheCorruptionError(`Cache file for '${profileName}' could not be decrypted`, undefined, {
        cause: error,
      });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}
