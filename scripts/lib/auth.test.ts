import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FileTokenStore,
  applyTokenUpdate,
  checkToken,
  isExpired,
  loadCredentials,
  parseClientCredentials,
  revokeToken,
  type TokenRecord,
  type TokenRefresher,
  type TokenStore,
} from "./auth.js";

class MemoryTokenStore implements TokenStore {
  readonly location = "memory://token";
  saved: TokenRecord[] = [];
  removed = false;

  constructor(private record: TokenRecord | null) {}

  async load(): Promise<TokenRecord | null> {
    return this.record;
  }

  async save(record: TokenRecord): Promise<void> {
    this.record = record;
    this.saved.push(record);
  }

  async remove(): Promise<boolean> {
    const existed = this.record !== null;
    this.record = null;
    this.removed = true;
    return existed;
  }
}

const NOW = 1_700_000_000_000;

function record(overrides: Partial<TokenRecord> = {}): TokenRecord {
  return {
    access_token: "test-access",
    refresh_token: "test-refresh",
    token_uri: "https://oauth2.googleapis.com/token",
    client_id: "test-client",
    client_secret: "test-secret",
    scopes: ["https://www.googleapis.com/auth/youtube.readonly"],
    expiry_date: NOW + 3_600_000,
    ...overrides,
  };
}

function refresherReturning(accessToken: string, expiryDate: number): TokenRefresher {
  return { refresh: vi.fn(async () => ({ access_token: accessToken, expiry_date: expiryDate })) };
}

describe("parseClientCredentials", () => {
  it("reads installed-app credentials", () => {
    expect(
      parseClientCredentials({ installed: { client_id: "id-1", client_secret: "test-secret" } })
    ).toEqual({ client_id: "id-1", client_secret: "test-secret" });
  });

  it("reads web credentials", () => {
    expect(
      parseClientCredentials({ web: { client_id: "id-2", client_secret: "test-secret" } })
    ).toEqual({ client_id: "id-2", client_secret: "test-secret" });
  });

  it("reads a flat object", () => {
    expect(parseClientCredentials({ client_id: "id-3", client_secret: "test-secret" })).toEqual({
      client_id: "id-3",
      client_secret: "test-secret",
    });
  });

  it("rejects files without a secret", () => {
    expect(() => parseClientCredentials({ installed: { client_id: "id-4" } })).toThrow(
      "Missing client_id or client_secret"
    );
  });
});

describe("isExpired", () => {
  it("treats a token inside the skew window as expired", () => {
    expect(isExpired(record({ expiry_date: NOW + 30_000 }), NOW)).toBe(true);
    expect(isExpired(record({ expiry_date: NOW + 120_000 }), NOW)).toBe(false);
  });

  it("treats a missing access token as expired", () => {
    expect(isExpired(record({ access_token: undefined }), NOW)).toBe(true);
  });

  it("trusts a token without an expiry", () => {
    expect(isExpired(record({ expiry_date: undefined }), NOW)).toBe(false);
  });
});

describe("loadCredentials", () => {
  it("returns a valid token without refreshing", async () => {
    const store = new MemoryTokenStore(record());
    const refresher = refresherReturning("unused", 0);

    const result = await loadCredentials(store, { refresher, now: NOW });

    expect(result).toEqual({ status: "ok", record: record(), refreshed: false, location: store.location });
    expect(refresher.refresh).not.toHaveBeenCalled();
    expect(store.saved).toHaveLength(0);
  });

  it("refreshes an expired token and persists it before returning", async () => {
    const store = new MemoryTokenStore(record({ access_token: "stale", expiry_date: NOW - 1 }));
    const refresher = refresherReturning("fresh", NOW + 3_600_000);

    const result = await loadCredentials(store, { refresher, now: NOW });

    const expected = record({ access_token: "fresh", expiry_date: NOW + 3_600_000 });
    expect(result).toEqual({ status: "ok", record: expected, refreshed: true, location: store.location });
    expect(store.saved).toEqual([expected]);
  });

  it("reports a missing token as absent", async () => {
    const result = await loadCredentials(new MemoryTokenStore(null), { now: NOW });
    expect(result).toEqual({ status: "absent", location: "memory://token" });
  });

  it("reports an expired token without a refresh token as invalid", async () => {
    const store = new MemoryTokenStore(record({ refresh_token: undefined, expiry_date: NOW - 1 }));
    const result = await loadCredentials(store, { now: NOW });
    expect(result).toEqual({
      status: "invalid",
      location: "memory://token",
      reason: "Access token expired and no refresh token is stored",
    });
  });

  it("reports an unreadable store as invalid", async () => {
    const store = new MemoryTokenStore(null);
    store.load = async () => {
      throw new Error("Unexpected token } in JSON");
    };
    const result = await loadCredentials(store, { now: NOW });
    expect(result).toEqual({
      status: "invalid",
      location: "memory://token",
      reason: "Unexpected token } in JSON",
    });
  });

  it("reports a rejected refresh as invalid without saving", async () => {
    const store = new MemoryTokenStore(record({ expiry_date: NOW - 1 }));
    const refresher: TokenRefresher = {
      refresh: async () => {
        throw new Error("invalid_grant");
      },
    };
    const result = await loadCredentials(store, { refresher, now: NOW });
    expect(result).toEqual({
      status: "invalid",
      location: "memory://token",
      reason: "Token refresh failed: invalid_grant",
    });
    expect(store.saved).toHaveLength(0);
  });
});

describe("checkToken", () => {
  it("summarizes a usable token", async () => {
    const status = await checkToken(new MemoryTokenStore(record()), { now: NOW });
    expect(status).toEqual({
      location: "memory://token",
      scopes: ["https://www.googleapis.com/auth/youtube.readonly"],
      expiresAt: new Date(NOW + 3_600_000).toISOString(),
      refreshed: false,
    });
  });

  it("throws when no token exists", async () => {
    await expect(checkToken(new MemoryTokenStore(null), { now: NOW })).rejects.toThrow(
      "No token found at memory://token. Run setup first."
    );
  });
});

describe("applyTokenUpdate", () => {
  it("keeps fields the update leaves out", () => {
    const updated = applyTokenUpdate(record(), { access_token: "rotated", expiry_date: NOW + 10 });
    expect(updated).toEqual(record({ access_token: "rotated", expiry_date: NOW + 10 }));
  });
});

describe("revokeToken", () => {
  it("revokes remotely and deletes the local token", async () => {
    const store = new MemoryTokenStore(record());
    const revoker = vi.fn(async (_token: string) => {});

    const result = await revokeToken(store, revoker);

    expect(revoker).toHaveBeenCalledWith("test-access");
    expect(result).toEqual({ deleted: true, revoked: true, warning: undefined });
  });

  it("deletes the local token even when revocation fails", async () => {
    const store = new MemoryTokenStore(record());
    const revoker = vi.fn(async (_token: string) => {
      throw new Error("network down");
    });

    const result = await revokeToken(store, revoker);

    expect(result).toEqual({ deleted: true, revoked: false, warning: "Revocation failed: network down" });
    expect(store.removed).toBe(true);
  });

  it("does nothing remote when there is no token", async () => {
    const revoker = vi.fn(async (_token: string) => {});
    const result = await revokeToken(new MemoryTokenStore(null), revoker);
    expect(revoker).not.toHaveBeenCalled();
    expect(result).toEqual({ deleted: false, revoked: false, warning: undefined });
  });
});

describe("FileTokenStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "youtube-skill-auth-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns null when the file is missing", async () => {
    const store = new FileTokenStore(path.join(dir, "token.json"));
    expect(await store.load()).toBeNull();
  });

  it("saves into a new directory and loads it back", async () => {
    const store = new FileTokenStore(path.join(dir, "nested", "token.json"));
    await store.save(record());

    const raw = await fs.readFile(store.location, "utf-8");
    expect(raw).toBe(JSON.stringify(record(), null, 2));
    expect(await store.load()).toEqual(record());
  });

  it("fills defaults for fields older token files lack", async () => {
    const location = path.join(dir, "token.json");
    await fs.writeFile(
      location,
      JSON.stringify({ token: null, refresh_token: "test-refresh", client_id: "c", client_secret: "test-secret" })
    );

    expect(await new FileTokenStore(location).load()).toEqual({
      refresh_token: "test-refresh",
      token_uri: "https://oauth2.googleapis.com/token",
      client_id: "c",
      client_secret: "test-secret",
      scopes: [],
    });
  });

  it("rejects a token file without client credentials", async () => {
    const location = path.join(dir, "token.json");
    await fs.writeFile(location, JSON.stringify({ refresh_token: "test-refresh" }));
    await expect(new FileTokenStore(location).load()).rejects.toThrow(
      "Invalid token file: client_id Required"
    );
  });

  it("reports whether there was a file to remove", async () => {
    const store = new FileTokenStore(path.join(dir, "token.json"));
    await store.save(record());
    expect(await store.remove()).toBe(true);
    expect(await store.remove()).toBe(false);
  });
});
