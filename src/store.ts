import { chmod, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from './logger';
import type { Session } from './types';
import { randomToken } from './utils';

export type StoreKind = 'file' | 'memory';

export const DEFAULT_SESSION_FILE = path.join(os.homedir(), '.alarm-panel', 'session.json');

export interface CredentialStore {
  load(): Promise<Session | undefined>;
  save(session: Session): Promise<void>;
  clear(): Promise<void>;
}

const sessionRecordSchema = z
  .object({
    version: z.literal(1),
    identity: z.string().min(1),
    secret: z.string().min(1),
    token: z.string().min(1),
    installation_id: z.string().min(1).optional(),
    timestamp: z.number().int().nonnegative()
  })
  .strict();

type SessionRecord = z.infer<typeof sessionRecordSchema>;

function toRecord(session: Session): SessionRecord {
  return {
    version: 1,
    identity: session.identity,
    secret: session.secret,
    token: session.token,
    ...(session.installationId ? { installation_id: session.installationId } : {}),
    timestamp: session.createdAt
  };
}

function fromRecord(record: SessionRecord): Session {
  return {
    identity: record.identity,
    secret: record.secret,
    token: record.token,
    ...(record.installation_id ? { installationId: record.installation_id } : {}),
    createdAt: record.timestamp
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class InMemoryCredentialStore implements CredentialStore {
  record?: SessionRecord;

  async load(): Promise<Session | undefined> {
    return this.record ? fromRecord(this.record) : undefined;
  }

  async save(session: Session): Promise<void> {
    this.record = toRecord(session);
  }

  async clear(): Promise<void> {
    this.record = undefined;
  }
}

export class FileCredentialStore implements CredentialStore {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<Session | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT') {
        this.logger.debug({ file: this.filePath }, 'no stored session');
      } else {
        this.logger.warn({ file: this.filePath, code }, 'stored session is unreadable');
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn({ file: this.filePath }, 'stored session is not valid JSON');
      return undefined;
    }

    const result = sessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(
        { file: this.filePath, issues: result.error.issues.map((issue) => issue.path.join('.')) },
        'stored session does not match the expected shape'
      );
      return undefined;
    }
    return fromRecord(result.data);
  }

  async save(session: Session): Promise<void> {
    const dir = path.dirname(this.filePath);
    await mkdir(dir, { recursive: true, mode: 0o700 });
    await chmod(dir, 0o700);

    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${randomToken('tmp')}`);
    try {
      await writeFile(tmpPath, `${JSON.stringify(toRecord(session), null, 2)}\n`, {
        encoding: 'utf8',
        mode: 0o600
      });
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
    this.logger.debug({ file: this.filePath }, 'session saved');
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
    this.logger.debug({ file: this.filePath }, 'session cleared');
  }
}

export function createCredentialStore(options: {
  kind: StoreKind;
  filePath?: string;
  logger: Logger;
}): CredentialStore {
  if (options.kind === 'memory') {
    return new InMemoryCredentialStore();
  }
  return new FileCredentialStore(options.filePath || DEFAULT_SESSION_FILE, options.logger);
}
