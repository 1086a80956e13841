import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { CredentialRecord } from '@ewelink-bridge/shared';
import type { ICredentialStorage } from '../interfaces/credential-storage.js';
import { REGION_IDS } from '../../config/constants.js';
import { seal, unseal } from '../../crypto/encrypt.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { BridgeError } from '../../errors/bridge-error.js';

const FILE_VERSION = 1;
const SEAL_CONTEXT = 'ewelink-bridge/credentials';

const userSchema = z.object({
  userId: z.string().optional(),
  email: z.string().optional(),
  phoneNumber: z.string().optional(),
  countryCode: z.string().optional(),
  nickname: z.string().optional(),
});

const recordSchema = z.object({
  appId: z.string().min(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  obtainedAt: z.string().datetime(),
  expiresAt: z.string().datetime().optional(),
  refreshExpiresAt: z.string().datetime().optional(),
  region: z.enum(REGION_IDS),
  user: userSchema.optional(),
  lastGoodRegion: z.enum(REGION_IDS).optional(),
  updatedAt: z.string().datetime(),
});

const recordsSchema = z.record(z.string(), recordSchema);

const fileSchema = z.union([
  z.object({ version: z.literal(FILE_VERSION), records: recordsSchema }),
  z.object({ version: z.literal(FILE_VERSION), encrypted: z.string().min(1) }),
]);

type Records = z.infer<typeof recordsSchema>;

export interface FileCredentialStorageOptions {
  path: string;
  encryptionKey?: string;
}

/**
 * Credential storage backed by a JSON file
 *
 * The whole file is rewritten on each change (write to a temp file, then
 * rename). With an encryption key the records are stored as a single
 * AES-256-GCM sealed blob.
 */
export class FileCredentialStorage implements ICredentialStorage {
  private readonly path: string;
  private readonly encryptionKey: string | undefined;

  constructor(options: FileCredentialStorageOptions) {
    this.path = options.path;
    this.encryptionKey = options.encryptionKey;
  }

  async find(appId: string): Promise<CredentialRecord | null> {
    const records = await this.readRecords();
    return records[appId] ?? null;
  }

  async upsert(record: CredentialRecord): Promise<void> {
    const records = await this.readRecords();
    records[record.appId] = record;
    await this.writeRecords(records);
  }

  async delete(appId: string): Promise<void> {
    const records = await this.readRecords();
    if (!(appId in records)) {
      return;
    }
    delete records[appId];
    await this.writeRecords(records);
  }

  private async readRecords(): Promise<Records> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return {};
      }
      throw BridgeError.serverError(`Could not read credentials file ${this.path}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw BridgeError.configuration(`Credentials file ${this.path} is not valid JSON`);
    }

    const parsed = fileSchema.safeParse(json);
    if (!parsed.success) {
      throw BridgeError.configuration(`Credentials file ${this.path} has an unexpected shape`);
    }

    if ('records' in parsed.data) {
      return parsed.data.records;
    }

    if (!this.encryptionKey) {
      throw BridgeError.configuration(
        `Credentials file ${this.path} is encrypted but no encryption key is configured`
      );
    }

    let plaintext: string;
    try {
      plaintext = unseal(parsed.data.encrypted, this.encryptionKey, { associatedData: SEAL_CONTEXT });
    } catch {
      throw BridgeError.configuration(`Credentials file ${this.path} could not be decrypted`);
    }

    const records = recordsSchema.safeParse(safeJsonParse(plaintext));
    if (!records.success) {
      throw BridgeError.configuration(`Credentials file ${this.path} has an unexpected shape`);
    }
    return records.data;
  }

  private async writeRecords(records: Records): Promise<void> {
    const contents = this.encryptionKey
      ? {
          version: FILE_VERSION,
          encrypted: seal(JSON.stringify(records), this.encryptionKey, { associatedData: SEAL_CONTEXT }),
        }
      : { version: FILE_VERSION, records };

    const tempPath = `${this.path}.${generateRandomBase64Url(6)}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(contents, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
    await rename(tempPath, this.path);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
