/**
 * Credential Store
 *
 * Keeps the inference API key encrypted at rest in the JSON config file.
 * The config holds three fields: `api_key` (plaintext, only until first
 * read), `encrypted_key` and `encryption_key`.
 *
 * @module services/credential-store
 */

import * as crypto from "crypto";
import * as fs from "fs/promises";
import * as path from "path";

/**
 * Interface for credential stores
 */
export interface CredentialStore {
  /**
   * @returns the plaintext API key, or null when none is configured or it
   * cannot be decrypted
   */
  get(): Promise<string | null>;

  /**
   * Encrypt and persist `plaintext` (trimmed).
   *
   * @returns the stored key, or null when it was empty or saving failed
   */
  set(plaintext: string): Promise<string | null>;
}

/**
 * On-disk config format
 */
export interface CredentialConfigFile {
  api_key: string;
  encrypted_key: string;
  encryption_key: string;
  [key: string]: unknown;
}

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

function emptyConfig(): CredentialConfigFile {
  return { api_key: "", encrypted_key: "", encryption_key: "" };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Encrypt a key with a fresh random data key.
 *
 * @returns base64 ciphertext (iv + tag + data) and base64 data key
 */
export function encryptCredential(plaintext: string): {
  encryptedKey: string;
  encryptionKey: string;
} {
  const key = crypto.randomBytes(32);
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
  const data = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  const tag = cipher.getAuthTag();
  return {
    encryptedKey: Buffer.concat([iv, tag, data]).toString("base64"),
    encryptionKey: key.toString("base64"),
  };
}

/**
 * Reverse of encryptCredential; throws when the data was tampered with or
 * the key does not match
 */
export function decryptCredential(
  encryptedKey: string,
  encryptionKey: string
): string {
  const payload = Buffer.from(encryptedKey, "base64");
  if (payload.length < IV_LENGTH + TAG_LENGTH) {
    throw new Error("Encrypted key is truncated");
  }
  const iv = payload.subarray(0, IV_LENGTH);
  const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const data = payload.subarray(IV_LENGTH + TAG_LENGTH);
  const decipher = crypto.createDecipheriv(
    ALGORITHM,
    Buffer.from(encryptionKey, "base64"),
    iv
  );
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(data), decipher.final()]).toString(
    "utf8"
  );
}

export class ConfigCredentialStore implements CredentialStore {
  constructor(private readonly configPath: string) {}

  async get(): Promise<string | null> {
    const config = await this.load();

    if (config.encrypted_key && config.encryption_key) {
      try {
        return decryptCredential(config.encrypted_key, config.encryption_key);
      } catch (error) {
        console.error(
          `[credentials] Error decrypting API key: ${errorMessage(error)}`
        );
        return null;
      }
    }

    if (config.api_key) {
      const plaintext = config.api_key;
      try {
        await this.save(this.withEncryptedKey(config, plaintext));
      } catch (error) {
        console.error(
          `[credentials] Failed to encrypt plaintext API key: ${errorMessage(error)}`
        );
      }
      return plaintext;
    }

    return null;
  }

  async set(plaintext: string): Promise<string | null> {
    const cleaned = plaintext.trim();
    if (!cleaned) {
      return null;
    }
    try {
      const config = await this.load();
      await this.save(this.withEncryptedKey(config, cleaned));
      console.log(`[credentials] API key saved and encrypted in '${this.configPath}'`);
      return cleaned;
    } catch (error) {
      console.error(`[credentials] Failed to save API key: ${errorMessage(error)}`);
      return null;
    }
  }

  private withEncryptedKey(
    config: CredentialConfigFile,
    plaintext: string
  ): CredentialConfigFile {
    const { encryptedKey, encryptionKey } = encryptCredential(plaintext);
    return {
      ...config,
      api_key: "",
      encrypted_key: encryptedKey,
      encryption_key: encryptionKey,
    };
  }

  /**
   * Read the config, creating it with empty fields when missing. Never
   * throws: an unreadable config counts as empty.
   */
  private async load(): Promise<CredentialConfigFile> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (!isNotFound(error)) {
        console.error(
          `[credentials] Failed to read config file '${this.configPath}': ${errorMessage(error)}`
        );
        return emptyConfig();
      }
      const config = emptyConfig();
      try {
        await this.save(config);
      } catch (saveError) {
        console.error(
          `[credentials] Failed to create config file '${this.configPath}': ${errorMessage(saveError)}`
        );
      }
      return config;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      console.warn(
        `[credentials] Failed to parse config file, using empty values: ${errorMessage(error)}`
      );
      return emptyConfig();
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      console.warn("[credentials] Config file is not a JSON object, using empty values");
      return emptyConfig();
    }

    const config: CredentialConfigFile = { ...emptyConfig() };
    for (const [key, value] of Object.entries(parsed)) {
      config[key] = value;
    }
    for (const field of ["api_key", "encrypted_key", "encryption_key"] as const) {
      const value = config[field];
      config[field] = typeof value === "string" ? value : "";
    }
    return config;
  }

  /**
   * Atomic write with owner-only permissions
   */
  private async save(config: CredentialConfigFile): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true, mode: 0o700 });
    const tempFile = `${this.configPath}.tmp`;
    await fs.writeFile(tempFile, JSON.stringify(config, null, 4), { mode: 0o600 });
    await fs.rename(tempFile, this.configPath);
    await fs.chmod(this.configPath, 0o600);
  }
}
