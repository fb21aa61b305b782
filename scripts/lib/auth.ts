import path from "node:path";
import fs from "node:fs/promises";
import http from "node:http";
import { google } from "googleapis";
import { OAuth2Client, type Credentials as GoogleTokens } from "google-auth-library";
import open from "open";
import { z } from "zod";

import {
  CREDENTIALS_PATH,
  DEFAULT_TOKEN_URI,
  OAUTH_CALLBACK_PORT,
  OAUTH_REDIRECT_URI,
  SCOPES,
  getGlobalTokenPath,
  getProjectTokenPath,
} from "./config.js";
import { fail } from "./output.js";

// ============================================================================
// Setup Instructions
// ============================================================================

export const SETUP_INSTRUCTIONS = `
═══════════════════════════════════════════════════════════════════════════════
                        YOUTUBE SKILL - FIRST TIME SETUP
═══════════════════════════════════════════════════════════════════════════════

These scripts need Google OAuth credentials to read your channel, analytics and
captions.

CREDENTIALS (one-time setup, shared across all projects):
  ${CREDENTIALS_PATH}

TOKENS (per-project, stores which Google account to use):
  .youtube-skill/token.local.json (in your project directory)

STEP 1: Create a Google Cloud Project
──────────────────────────────────────
1. Go to: https://console.cloud.google.com/
2. Click the project dropdown (top left) → "New Project"
3. Name it anything → Create, then select it

STEP 2: Enable the APIs
───────────────────────
1. Go to: https://console.cloud.google.com/apis/library
2. Search "YouTube Data API v3" → Enable
3. Search "YouTube Analytics API" → Enable

STEP 3: Configure OAuth Consent Screen
──────────────────────────────────────
1. Go to: https://console.cloud.google.com/apis/credentials/consent
2. Select "External" → Create, fill in the app name and your email
3. Add these scopes:
${SCOPES.map((s) => `   - ${s}`).join("\n")}
4. Add your email as a test user

STEP 4: Create OAuth Credentials
────────────────────────────────
1. Go to: https://console.cloud.google.com/apis/credentials
2. "Create Credentials" → "OAuth client ID" → Application type "Desktop app"
3. Download the JSON and save it to: ${CREDENTIALS_PATH}

STEP 5: Authenticate
────────────────────
  npx tsx skills/youtube/scripts/youtube-auth.ts setup

═══════════════════════════════════════════════════════════════════════════════
`;

// ============================================================================
// Client credentials
// ============================================================================

const clientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

// Handle all formats: {installed: {...}}, {web: {...}} or flat {client_id, client_secret}
const clientFileSchema = z.union([
  z.object({ installed: clientSecretSchema }).transform((d) => d.installed),
  z.object({ web: clientSecretSchema }).transform((d) => d.web),
  clientSecretSchema,
]);

export type ClientCredentials = z.infer<typeof clientSecretSchema>;

export function parseClientCredentials(data: unknown): ClientCredentials {
  const parsed = clientFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error("Missing client_id or client_secret");
  }
  return {
    client_id: parsed.data.client_id,
    client_secret: parsed.data.client_secret,
  };
}

export async function loadClientCredentials(
  credentialsPath: string = CREDENTIALS_PATH
): Promise<ClientCredentials> {
  try {
    const content = await fs.readFile(credentialsPath, "utf-8");
    return parseClientCredentials(JSON.parse(content));
  } catch (err) {
    if (isMissingFile(err)) {
      console.error(SETUP_INSTRUCTIONS);
      fail(`Credentials not found at ${credentialsPath}`);
    }
    throw err;
  }
}

// ============================================================================
// Token store
// ============================================================================

const tokenRecordSchema = z.object({
  access_token: z.string().nullish().transform((v) => v ?? undefined),
  refresh_token: z.string().nullish().transform((v) => v ?? undefined),
  token_uri: z.string().default(DEFAULT_TOKEN_URI),
  client_id: z.string(),
  client_secret: z.string(),
  scopes: z.array(z.string()).default([]),
  expiry_date: z.number().nullish().transform((v) => v ?? undefined),
});

export type TokenRecord = z.infer<typeof tokenRecordSchema>;

export function parseTokenRecord(data: unknown): TokenRecord {
  const parsed = tokenRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid token file: ${issue.path.join(".") || "root"} ${issue.message}`);
  }
  return parsed.data;
}

export interface TokenStore {
  readonly location: string;
  load(): Promise<TokenRecord | null>;
  save(record: TokenRecord): Promise<void>;
  remove(): Promise<boolean>;
}

export class FileTokenStore implements TokenStore {
  constructor(readonly location: string) {}

  async load(): Promise<TokenRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(this.location, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return parseTokenRecord(JSON.parse(content));
  }

  async save(record: TokenRecord): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    await fs.writeFile(this.location, JSON.stringify(record, null, 2));
  }

  async remove(): Promise<boolean> {
    try {
      await fs.unlink(this.location);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }
}

export async function findTokenPath(): Promise<string | null> {
  for (const candidate of [getProjectTokenPath(), getGlobalTokenPath()]) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Not found here, try the next location
    }
  }
  return null;
}

/**
 * Store for the token in use: project-local first, then the global fallback.
 * New tokens are always written project-local.
 */
export async function resolveTokenStore(): Promise<FileTokenStore> {
  const existing = await findTokenPath();
  return new FileTokenStore(existing ?? getProjectTokenPath());
}

// ============================================================================
// Refresh
// ============================================================================

export interface RefreshedToken {
  access_token: string;
  expiry_date?: number;
}

export interface TokenRefresher {
  refresh(record: TokenRecord): Promise<RefreshedToken>;
}

export const googleTokenRefresher: TokenRefresher = {
  async refresh(record) {
    const client = new OAuth2Client(record.client_id, record.client_secret);
    client.setCredentials({ refresh_token: record.refresh_token });
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error("Token refresh returned no access token");
    }
    return {
      access_token: token,
      expiry_date: client.credentials.expiry_date ?? undefined,
    };
  },
};

// Refresh slightly early so a token doesn't expire mid-request
const EXPIRY_SKEW_MS = 60_000;

export function isExpired(record: TokenRecord, now: number): boolean {
  if (!record.access_token) return true;
  if (record.expiry_date === undefined) return false;
  return record.expiry_date - EXPIRY_SKEW_MS <= now;
}

export type CredentialResult =
  | { status: "ok"; record: TokenRecord; refreshed: boolean; location: string }
  | { status: "absent"; location: string }
  | { status: "invalid"; location: string; reason: string };

export interface LoadCredentialsOptions {
  refresher?: TokenRefresher;
  now?: number;
}

/**
 * Load the stored token, refreshing and persisting it first when the access
 * token is missing or expired.
 */
export async function loadCredentials(
  store: TokenStore,
  options: LoadCredentialsOptions = {}
): Promise<CredentialResult> {
  const { refresher = googleTokenRefresher, now = Date.now() } = options;

  let record: TokenRecord | null;
  try {
    record = await store.load();
  } catch (err) {
    return { status: "invalid", location: store.location, reason: errorMessage(err) };
  }

  if (!record) {
    return { status: "absent", location: store.location };
  }

  if (!isExpired(record, now)) {
    return { status: "ok", record, refreshed: false, location: store.location };
  }

  if (!record.refresh_token) {
    return {
      status: "invalid",
      location: store.location,
      reason: "Access token expired and no refresh token is stored",
    };
  }

  let fresh: RefreshedToken;
  try {
    fresh = await refresher.refresh(record);
  } catch (err) {
    // A revoked or expired grant needs a new consent, not a retry
    return { status: "invalid", location: store.location, reason: `Token refresh failed: ${errorMessage(err)}` };
  }
  const updated: TokenRecord = {
    ...record,
    access_token: fresh.access_token,
    expiry_date: fresh.expiry_date,
  };
  await store.save(updated);
  return { status: "ok", record: updated, refreshed: true, location: store.location };
}

// ============================================================================
// Authenticated client
// ============================================================================

export function applyTokenUpdate(record: TokenRecord, tokens: GoogleTokens): TokenRecord {
  return {
    ...record,
    access_token: tokens.access_token ?? record.access_token,
    refresh_token: tokens.refresh_token ?? record.refresh_token,
    expiry_date: tokens.expiry_date ?? record.expiry_date,
  };
}

export class NotAuthenticatedError extends Error {
  constructor(
    readonly status: "absent" | "invalid",
    readonly location: string,
    message: string
  ) {
    super(message);
    this.name = "NotAuthenticatedError";
  }
}

/**
 * Authenticated client for the stored token.
 * @throws NotAuthenticatedError when there is no usable token
 */
export async function authorize(store?: TokenStore): Promise<OAuth2Client> {
  const tokenStore = store ?? (await resolveTokenStore());
  const result = await loadCredentials(tokenStore);

  if (result.status === "absent") {
    throw new NotAuthenticatedError("absent", result.location, `Token not found at ${result.location}`);
  }
  if (result.status === "invalid") {
    throw new NotAuthenticatedError(
      "invalid",
      result.location,
      `Failed to load token from ${result.location}: ${result.reason}`
    );
  }
  if (result.refreshed) {
    console.error(`✓ Token refreshed and saved to ${result.location}`);
  }

  let record = result.record;
  const oauth2Client = new google.auth.OAuth2(
    record.client_id,
    record.client_secret,
    OAUTH_REDIRECT_URI
  );
  oauth2Client.setCredentials({
    access_token: record.access_token,
    refresh_token: record.refresh_token,
    expiry_date: record.expiry_date,
  });

  // The client refreshes on its own during long runs; keep the file current
  oauth2Client.on("tokens", (tokens) => {
    record = applyTokenUpdate(record, tokens);
    tokenStore.save(record).catch((err) => {
      console.error(`✗ Failed to save refreshed token: ${errorMessage(err)}`);
    });
  });

  return oauth2Client;
}

/**
 * Like `authorize`, but a missing or unusable token prints setup guidance
 * and exits.
 */
export async function loadToken(store?: TokenStore): Promise<OAuth2Client> {
  try {
    return await authorize(store);
  } catch (err) {
    if (!(err instanceof NotAuthenticatedError)) throw err;
    if (err.status === "absent") {
      console.error(SETUP_INSTRUCTIONS);
      fail(
        `Token not found. Run: npx tsx skills/youtube/scripts/youtube-auth.ts setup\n` +
        `Token will be saved to: ${getProjectTokenPath()}`
      );
    }
    fail(`${err.message}\nRun: npx tsx skills/youtube/scripts/youtube-auth.ts setup`);
  }
}

// ============================================================================
// Interactive setup
// ============================================================================

async function ensureGitignore(): Promise<void> {
  const gitignorePath = path.join(process.cwd(), ".gitignore");
  const pattern = ".youtube-skill/";

  try {
    const content = await fs.readFile(gitignorePath, "utf-8");
    if (content.includes(pattern)) {
      return;
    }
    const newContent = content.endsWith("\n")
      ? content + `\n# YouTube skill tokens (per-project auth)\n${pattern}\n`
      : content + `\n\n# YouTube skill tokens (per-project auth)\n${pattern}\n`;
    await fs.writeFile(gitignorePath, newContent);
    console.error(`✓ Added ${pattern} to .gitignore`);
  } catch (err) {
    if (isMissingFile(err)) {
      await fs.writeFile(gitignorePath, `# YouTube skill tokens (per-project auth)\n${pattern}\n`);
      console.error(`✓ Created .gitignore with ${pattern}`);
    } else {
      throw err;
    }
  }
}

const AUTH_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Listen on the callback port for the single OAuth redirect and return its code.
 */
function waitForAuthCode(authUrl: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? "/", `http://localhost:${OAUTH_CALLBACK_PORT}`);
      const code = url.searchParams.get("code");
      const error = url.searchParams.get("error");

      if (!code && !error) {
        res.writeHead(404);
        res.end();
        return;
      }

      clearTimeout(timer);
      server.close();

      if (error) {
        res.writeHead(400, { "Content-Type": "text/html" });
        res.end(`<h1>Error: ${error}</h1><p>You can close this window.</p>`);
        reject(new Error(error));
        return;
      }

      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(`
        <html>
          <body style="font-family: system-ui; display: flex; justify-content: center; align-items: center; height: 100vh; margin: 0;">
            <div style="text-align: center;">
              <h1 style="color: #22c55e;">✓ Authorization complete!</h1>
              <p>You can close this window and return to the terminal.</p>
            </div>
          </body>
        </html>
      `);
      resolve(code ?? "");
    });

    const timer = setTimeout(() => {
      server.close();
      reject(new Error("Authentication timeout (5 minutes)"));
    }, AUTH_TIMEOUT_MS);

    server.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    server.listen(OAUTH_CALLBACK_PORT, () => {
      open(authUrl).catch(() => {
        console.error("Could not open browser automatically.");
      });
    });
  });
}

export async function performAuth(): Promise<string> {
  const credentials = await loadClientCredentials();
  const tokenPath = getProjectTokenPath();

  await fs.mkdir(path.dirname(tokenPath), { recursive: true });
  await ensureGitignore();

  const oauth2Client = new google.auth.OAuth2(
    credentials.client_id,
    credentials.client_secret,
    OAUTH_REDIRECT_URI
  );

  const authUrl = oauth2Client.generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });

  console.error("\nOpening browser for authorization...");
  console.error("If browser doesn't open, visit:\n", authUrl, "\n");

  const code = await waitForAuthCode(authUrl);
  const { tokens } = await oauth2Client.getToken(code);

  if (!tokens.refresh_token) {
    fail(
      "No refresh token received.\n" +
      "This can happen if you've already authorized this app.\n" +
      "Fix: Go to https://myaccount.google.com/permissions\n" +
      "     Remove access for this app, then run setup again."
    );
  }

  const record: TokenRecord = {
    access_token: tokens.access_token ?? undefined,
    refresh_token: tokens.refresh_token,
    token_uri: DEFAULT_TOKEN_URI,
    client_id: credentials.client_id,
    client_secret: credentials.client_secret,
    scopes: tokens.scope ? tokens.scope.split(" ") : SCOPES,
    expiry_date: tokens.expiry_date ?? undefined,
  };

  await new FileTokenStore(tokenPath).save(record);
  console.error(`\n✓ Token saved to ${tokenPath}`);
  return tokenPath;
}

// ============================================================================
// Check & revoke
// ============================================================================

export interface TokenStatus {
  location: string;
  scopes: string[];
  expiresAt?: string;
  refreshed: boolean;
}

export async function checkToken(
  store: TokenStore,
  options: LoadCredentialsOptions = {}
): Promise<TokenStatus> {
  const result = await loadCredentials(store, options);
  if (result.status === "absent") {
    throw new Error(`No token found at ${result.location}. Run setup first.`);
  }
  if (result.status === "invalid") {
    throw new Error(`Token at ${result.location} is unusable: ${result.reason}`);
  }
  return {
    location: result.location,
    scopes: result.record.scopes,
    expiresAt: result.record.expiry_date
      ? new Date(result.record.expiry_date).toISOString()
      : undefined,
    refreshed: result.refreshed,
  };
}

export type TokenRevoker = (token: string) => Promise<void>;

export const googleTokenRevoker: TokenRevoker = async (token) => {
  await new OAuth2Client().revokeToken(token);
};

export interface RevokeResult {
  deleted: boolean;
  revoked: boolean;
  warning?: string;
}

/**
 * Revoke the stored token with Google and delete the local file. The file is
 * deleted even when the remote revocation fails.
 */
export async function revokeToken(
  store: TokenStore,
  revoker: TokenRevoker = googleTokenRevoker
): Promise<RevokeResult> {
  let record: TokenRecord | null = null;
  let warning: string | undefined;
  try {
    record = await store.load();
  } catch (err) {
    warning = `Could not read token: ${errorMessage(err)}`;
  }

  let revoked = false;
  const token = record?.access_token ?? record?.refresh_token;
  if (token) {
    try {
      await revoker(token);
      revoked = true;
    } catch (err) {
      warning = `Revocation failed: ${errorMessage(err)}`;
    }
  }

  const deleted = await store.remove();
  return { deleted, revoked, warning };
}

// ============================================================================
// Helpers
// ============================================================================

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
