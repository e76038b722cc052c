import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { CredentialError, errorMessage } from "../errors.js";

export type StoredOAuthTokens = {
  accessToken?: string;
  refreshToken?: string;
  expiryDate?: number;
  scope?: string;
  tokenType?: string;
};

// googleapis writes access_token/expiry_date; other Google client libraries
// write token/expiry. Both shapes are accepted.
const tokenFileSchema = z
  .object({
    access_token: z.string().optional(),
    token: z.string().optional(),
    refresh_token: z.string().optional(),
    expiry_date: z.number().optional(),
    expiry: z.string().optional(),
    scope: z.string().optional(),
    scopes: z.array(z.string()).optional(),
    token_type: z.string().optional()
  })
  .passthrough();

const readJson = (filePath: string, label: string): unknown => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new CredentialError(`Cannot read ${label} at ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new CredentialError(`${label} at ${filePath} is not valid JSON`, { cause: error });
  }
};

export class TokenFileStore {
  constructor(private readonly tokenPath: string) {}

  exists(): boolean {
    return fs.existsSync(this.tokenPath);
  }

  read(): StoredOAuthTokens {
    const parsed = tokenFileSchema.safeParse(readJson(this.tokenPath, "OAuth token file"));
    if (!parsed.success) {
      throw new CredentialError(`OAuth token file at ${this.tokenPath} has an unexpected shape`);
    }

    const data = parsed.data;
    const tokens: StoredOAuthTokens = {};
    const accessToken = data.access_token ?? data.token;
    if (accessToken) {
      tokens.accessToken = accessToken;
    }
    if (data.refresh_token) {
      tokens.refreshToken = data.refresh_token;
    }

    const expiry = data.expiry_date ?? (data.expiry ? Date.parse(data.expiry) : Number.NaN);
    if (Number.isFinite(expiry)) {
      tokens.expiryDate = expiry;
    }

    const scope = data.scope ?? data.scopes?.join(" ");
    if (scope) {
      tokens.scope = scope;
    }
    if (data.token_type) {
      tokens.tokenType = data.token_type;
    }

    return tokens;
  }

  /** Merges `update` into the stored tokens so a refresh never drops the refresh token. */
  write(update: StoredOAuthTokens): void {
    const current = this.exists() ? this.read() : {};
    const merged: StoredOAuthTokens = { ...current, ...update };
    const payload: Record<string, string | number> = {};

    if (merged.accessToken) {
      payload.access_token = merged.accessToken;
    }
    if (merged.refreshToken) {
      payload.refresh_token = merged.refreshToken;
    }
    if (typeof merged.expiryDate === "number") {
      payload.expiry_date = merged.expiryDate;
    }
    if (merged.scope) {
      payload.scope = merged.scope;
    }
    if (merged.tokenType) {
      payload.token_type = merged.tokenType;
    }

    fs.mkdirSync(path.dirname(this.tokenPath), { recursive: true });
    fs.writeFileSync(this.tokenPath, JSON.stringify(payload, null, 2), {
      encoding: "utf8",
      mode: 0o600
    });
    // The mode option only applies when the file is created.
    fs.chmodSync(this.tokenPath, 0o600);
  }
}

const clientSecretsSchema = z.union([
  z.object({
    installed: z.object({ client_id: z.string().min(1), client_secret: z.string().min(1) })
  }),
  z.object({
    web: z.object({ client_id: z.string().min(1), client_secret: z.string().min(1) })
  })
]);

export type OAuthClientSecrets = {
  clientId: string;
  clientSecret: string;
};

export const readClientSecrets = (filePath: string): OAuthClientSecrets => {
  const parsed = clientSecretsSchema.safeParse(readJson(filePath, "OAuth client secrets"));
  if (!parsed.success) {
    throw new CredentialError(
      `OAuth client secrets at ${filePath} must contain an "installed" or "web" client`
    );
  }

  const client = "installed" in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: client.client_id, clientSecret: client.client_secret };
};

export const readStreamKey = (filePath: string): string => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new CredentialError(`Cannot read stream key file at ${filePath}: ${errorMessage(error)}`, {
      cause: error
    });
  }

  const key = raw.trim();
  if (!key) {
    throw new CredentialError(`Stream key file at ${filePath} is empty`);
  }

  return key;
};
