import path from "path";
import fs from "fs/promises";
import { authenticate } from "@google-cloud/local-auth";
import { OAuth2Client, type Credentials } from "google-auth-library";

import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { ConfigError, describeError, errorCode } from "../application/errors";

type GoogleTokens = {
  access_token?: string;
  refresh_token?: string;
  scope?: string;
  token_type?: string;
  expiry_date?: number;
};

const SCOPES = ["https://www.googleapis.com/auth/drive.file"];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function getString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function getNumber(v: unknown): number | undefined {
  return typeof v === "number" ? v : undefined;
}

function getStringArray(v: unknown): string[] | undefined {
  return Array.isArray(v) && v.every((x) => typeof x === "string") ? v : undefined;
}

// normaliza null -> undefined (entrada pode ser qualquer coisa)
function normalizeTokens(t: unknown): GoogleTokens {
  if (!isRecord(t)) return {};

  return {
    access_token: getString(t["access_token"]),
    refresh_token: getString(t["refresh_token"]),
    scope: getString(t["scope"]),
    token_type: getString(t["token_type"]),
    expiry_date: getNumber(t["expiry_date"]),
  };
}

type ClientSecrets = { clientId: string; clientSecret: string; redirectUri: string };

export function parseClientSecrets(raw: unknown, credentialsPath: string): ClientSecrets {
  const creds = isRecord(raw) ? raw : {};
  const installed = creds["installed"];
  const web = creds["web"];
  const section = isRecord(installed) ? installed : isRecord(web) ? web : {};

  const clientId = getString(section["client_id"]);
  const clientSecret = getString(section["client_secret"]);
  const redirectUris = getStringArray(section["redirect_uris"]);

  if (!clientId || !clientSecret) {
    throw new ConfigError(
      `Invalid OAuth client file "${credentialsPath}": expected "installed.client_id" and "installed.client_secret"`
    );
  }
  return { clientId, clientSecret, redirectUri: redirectUris?.[0] ?? "http://localhost" };
}

/**
 * Desktop OAuth flow for Drive. Tokens are kept in `<tokenDir>/google.tokens.json`
 * and refreshed tokens are merged back into it.
 */
export class GoogleAuth {
  private tokenPath: string;
  private credentialsPath: string;
  private logger: Logger;

  constructor(opts: { tokenDirAbs: string; credentialsPathAbs: string; logger?: Logger }) {
    this.tokenPath = path.join(opts.tokenDirAbs, "google.tokens.json");
    this.credentialsPath = opts.credentialsPathAbs;
    this.logger = opts.logger ?? silentLogger;
  }

  async getAuthorizedClient(): Promise<OAuth2Client> {
    let credsRaw: string;
    try {
      credsRaw = await fs.readFile(this.credentialsPath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Cannot read OAuth client file "${this.credentialsPath}"`, err);
    }
    const secrets = parseClientSecrets(JSON.parse(credsRaw), this.credentialsPath);

    const client = new OAuth2Client(secrets.clientId, secrets.clientSecret, secrets.redirectUri);

    // 1) tenta token salvo
    const saved = await this.readTokens();
    if (saved) {
      client.setCredentials(saved);
    } else {
      const authed = await authenticate({ keyfilePath: this.credentialsPath, scopes: SCOPES });
      client.setCredentials(authed.credentials);
      await this.saveTokens(normalizeTokens(authed.credentials));
    }

    // garante que existe access_token (usa refresh_token se necessário)
    await client.getAccessToken();

    client.on("tokens", (tokens: Credentials) => {
      this.mergeTokens(tokens).catch((err: unknown) => {
        this.logger.warn("could not persist refreshed Google tokens", {
          file: this.tokenPath,
          error: describeError(err),
        });
      });
    });
    return client;
  }

  private async readTokens(): Promise<GoogleTokens | null> {
    try {
      const raw = await fs.readFile(this.tokenPath, "utf-8");
      return normalizeTokens(JSON.parse(raw));
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  private async mergeTokens(tokens: Credentials): Promise<void> {
    const current = (await this.readTokens()) ?? {};
    await this.saveTokens(normalizeTokens({ ...current, ...tokens }));
  }

  private async saveTokens(tokens: GoogleTokens) {
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(tokens, null, 2), "utf-8");
  }
}
