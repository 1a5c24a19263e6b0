import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

export interface CredentialVault {
  loadToken(): Promise<string | null>;
  storeToken(token: string): Promise<void>;
  clearToken(): Promise<void>;
}

export class MemoryCredentialVault implements CredentialVault {
  private token: string | null;

  constructor(token: string | null = null) {
    this.token = token;
  }

  async loadToken(): Promise<string | null> {
    return this.token;
  }

  async storeToken(token: string): Promise<void> {
    this.token = token;
  }

  async clearToken(): Promise<void> {
    this.token = null;
  }
}

const TokenFileSchema = z.record(z.string(), z.object({ token: z.string().min(1) }));
type TokenFileData = z.infer<typeof TokenFileSchema>;

/**
 * Tokens kept in a JSON file readable only by the current user, one entry per account.
 */
export class FileCredentialVault implements CredentialVault {
  private readonly filePath: string;
  private readonly account: string;

  constructor(filePath: string, account: string) {
    this.filePath = filePath;
    this.account = account;
  }

  async loadToken(): Promise<string | null> {
    const data = await this.read();
    return data[this.account]?.token ?? null;
  }

  async storeToken(token: string): Promise<void> {
    const data = await this.read();
    data[this.account] = { token };
    await this.write(data);
  }

  async clearToken(): Promise<void> {
    const data = await this.read();
    if (!(this.account in data)) {
      return;
    }
    delete data[this.account];
    await this.write(data);
  }

  private async read(): Promise<TokenFileData> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        return {};
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return {};
    }
    const result = TokenFileSchema.safeParse(parsed);
    return result.success ? result.data : {};
  }

  private async write(data: TokenFileData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf8');
    await fs.chmod(this.filePath, 0o600);
  }
}
