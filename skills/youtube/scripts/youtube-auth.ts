#!/usr/bin/env npx tsx

/**
 * YouTube Auth CLI - Set up, check and revoke the OAuth token
 */

import {
  checkToken,
  performAuth,
  resolveTokenStore,
  revokeToken,
} from "../../../scripts/lib/auth.js";
import { CREDENTIALS_PATH, getProjectTokenPath } from "../../../scripts/lib/config.js";
import { output, fail, parseArgs, report } from "../../../scripts/lib/output.js";

function printUsage(): void {
  console.log(`
YouTube Auth CLI

COMMANDS:
  setup                   Authenticate with Google (opens browser)
  check                   Validate the token, refreshing it if expired
  revoke                  Revoke the token and delete the local file

OPTIONS:
  --json                  Print a JSON result instead of text

Credentials: ${CREDENTIALS_PATH}
Token:       ${getProjectTokenPath()} (per-project)
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const { flags } = parseArgs(args.slice(1));

  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  try {
    switch (command) {
      case "setup":
      case "auth": {
        const tokenPath = await performAuth();
        report(
          flags,
          ["Success! You can now use the other YouTube scripts."],
          { message: "Authenticated", tokenPath }
        );
        break;
      }

      case "check": {
        const store = await resolveTokenStore();
        const status = await checkToken(store);
        const lines = [
          "Token is valid.",
          `Location: ${status.location}`,
          `Scopes: ${status.scopes.join(", ")}`,
        ];
        if (status.expiresAt) lines.push(`Access token expires: ${status.expiresAt}`);
        if (status.refreshed) lines.push("(refreshed and saved)");
        report(flags, lines, status);
        break;
      }

      case "revoke": {
        const store = await resolveTokenStore();
        const result = await revokeToken(store);
        if (result.warning) console.error(`✗ ${result.warning}`);
        const message = result.deleted
          ? result.revoked
            ? "Token revoked and deleted."
            : "Local token file deleted."
          : "No token file found. Nothing to revoke.";
        report(flags, [message], { ...result, location: store.location });
        if (result.warning) process.exit(1);
        break;
      }

      default:
        output({ success: false, error: `Unknown command: ${command}. Run with --help for usage.` });
        process.exit(1);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    fail(message);
  }
}

main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
