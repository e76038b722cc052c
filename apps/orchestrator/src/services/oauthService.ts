import http from "node:http";
import { URL } from "node:url";

import { google } from "googleapis";
import type { Logger } from "pino";

import { CredentialError, errorMessage } from "../errors.js";
import { readClientSecrets, type StoredOAuthTokens, type TokenFileStore } from "./secretStore.js";

const OAUTH_SCOPES = ["https://www.googleapis.com/auth/youtube"];
const CALLBACK_TIMEOUT_MS = 180_000;

export type OAuthClient = InstanceType<typeof google.auth.OAuth2>;

type GoogleCredentials = {
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
  scope?: string;
  token_type?: string | null;
};

const toCredentials = (tokens: StoredOAuthTokens): GoogleCredentials => ({
  ...(tokens.accessToken ? { access_token: tokens.accessToken } : {}),
  ...(tokens.refreshToken ? { refresh_token: tokens.refreshToken } : {}),
  ...(typeof tokens.expiryDate === "number" ? { expiry_date: tokens.expiryDate } : {}),
  ...(tokens.scope ? { scope: tokens.scope } : {}),
  ...(tokens.tokenType ? { token_type: tokens.tokenType } : {})
});

const fromCredentials = (credentials: GoogleCredentials): StoredOAuthTokens => {
  const tokens: StoredOAuthTokens = {};
  if (credentials.access_token) {
    tokens.accessToken = credentials.access_token;
  }
  if (credentials.refresh_token) {
    tokens.refreshToken = credentials.refresh_token;
  }
  if (typeof credentials.expiry_date === "number") {
    tokens.expiryDate = credentials.expiry_date;
  }
  if (credentials.scope) {
    tokens.scope = credentials.scope;
  }
  if (credentials.token_type) {
    tokens.tokenType = credentials.token_type;
  }
  return tokens;
};

const findOpenPort = async (): Promise<number> => {
  return new Promise((resolve, reject) => {
    const probeServer = http.createServer();
    probeServer.listen(0, "127.0.0.1", () => {
      const address = probeServer.address();
      if (!address || typeof address === "string") {
        reject(new Error("Unable to allocate local OAuth callback port"));
        return;
      }

      const port = address.port;
      probeServer.close(() => resolve(port));
    });
    probeServer.on("error", reject);
  });
};

const waitForOAuthCode = async (port: number, redirectUri: string): Promise<string> => {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      server.close();
      reject(new Error("Timed out waiting for OAuth callback"));
    }, CALLBACK_TIMEOUT_MS);

    const server = http.createServer((req, res) => {
      const requestUrl = new URL(req.url ?? "/", redirectUri);

      if (requestUrl.pathname !== "/oauth2callback") {
        res.statusCode = 404;
        res.end("Not found");
        return;
      }

      clearTimeout(timeout);
      const denied = requestUrl.searchParams.get("error");
      const code = requestUrl.searchParams.get("code");

      if (denied || !code) {
        res.statusCode = 400;
        res.end("Authorization failed. You can close this tab.");
        server.close();
        reject(new Error(denied ? `OAuth denied: ${denied}` : "OAuth callback did not include a code"));
        return;
      }

      res.statusCode = 200;
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.end("<h3>Authorization complete. You can close this tab.</h3>");
      server.close();
      resolve(code);
    });

    server.on("error", (error) => {
      clearTimeout(timeout);
      reject(error);
    });

    server.listen(port, "127.0.0.1");
  });
};

export class OauthService {
  constructor(
    private readonly clientSecretsPath: string,
    private readonly tokenStore: TokenFileStore,
    private readonly logger: Logger
  ) {}

  /**
   * Builds an authorized client from the stored token. Refreshed tokens are
   * written back so a restart never needs a new consent.
   */
  buildOAuthClient(): OAuthClient {
    const { clientId, clientSecret } = readClientSecrets(this.clientSecretsPath);

    if (!this.tokenStore.exists()) {
      throw new CredentialError(
        "YouTube OAuth token not found. Run `relaycam authorize` on a machine with a browser and copy the token file into place."
      );
    }

    const tokens = this.tokenStore.read();
    if (!tokens.refreshToken && !tokens.accessToken) {
      throw new CredentialError(
        "YouTube OAuth token file holds no usable token. Run `relaycam authorize` to create a new one."
      );
    }

    const oauthClient = new google.auth.OAuth2(clientId, clientSecret);
    oauthClient.setCredentials(toCredentials(tokens));
    oauthClient.on("tokens", (refreshed) => {
      const update = fromCredentials(refreshed);
      try {
        this.tokenStore.write(update);
        this.logger.debug("Persisted refreshed OAuth token");
      } catch (error) {
        this.logger.warn({ reason: errorMessage(error) }, "Could not persist refreshed OAuth token");
      }
    });

    return oauthClient;
  }

  /** Loopback consent flow; prints the consent URL instead of opening a browser. */
  async authorize(): Promise<void> {
    const { clientId, clientSecret } = readClientSecrets(this.clientSecretsPath);
    const port = await findOpenPort();
    const redirectUri = `http://127.0.0.1:${port}/oauth2callback`;

    const oauthClient = new google.auth.OAuth2(clientId, clientSecret, redirectUri);
    const authUrl = oauthClient.generateAuthUrl({
      access_type: "offline",
      prompt: "consent",
      include_granted_scopes: true,
      scope: OAUTH_SCOPES
    });

    const codePromise = waitForOAuthCode(port, redirectUri);
    this.logger.info({ url: authUrl }, "Open this URL in a browser on this machine to authorize");

    const code = await codePromise;
    const { tokens } = await oauthClient.getToken(code);

    const stored = fromCredentials(tokens);

    if (!stored.refreshToken) {
      this.logger.warn("Consent returned no refresh token; the stored token will expire");
    }

    this.tokenStore.write(stored);
    this.logger.info("OAuth token written");
  }
}
