import path from "node:path";
import os from "node:os";

// ============================================================================
// Configuration
// ============================================================================

// Global config for OAuth client credentials and the transcript cache
export function getGlobalConfigDir(): string {
  if (process.env.YOUTUBE_SKILL_CONFIG_DIR) {
    return process.env.YOUTUBE_SKILL_CONFIG_DIR;
  }
  const xdgConfig = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(xdgConfig, "youtube-skill");
}

export const CREDENTIALS_PATH = path.join(getGlobalConfigDir(), "credentials.json");

// Project-local token storage (different Google account per project)
const PROJECT_TOKEN_DIR = ".youtube-skill";
const PROJECT_TOKEN_FILE = "token.local.json";

export function getProjectTokenPath(): string {
  return path.join(process.cwd(), PROJECT_TOKEN_DIR, PROJECT_TOKEN_FILE);
}

export function getGlobalTokenPath(): string {
  return path.join(getGlobalConfigDir(), "token.json");
}

export function getTranscriptsDir(): string {
  return path.join(getGlobalConfigDir(), "transcripts");
}

export function getTranscriptIndexPath(): string {
  return path.join(getGlobalConfigDir(), "transcript_index.json");
}

export const SCOPES = [
  "https://www.googleapis.com/auth/youtube.readonly",
  "https://www.googleapis.com/auth/yt-analytics.readonly",
  "https://www.googleapis.com/auth/yt-analytics-monetary.readonly",
];

export const OAUTH_CALLBACK_PORT = 8080;
export const OAUTH_REDIRECT_URI = `http://localhost:${OAUTH_CALLBACK_PORT}/callback`;
export const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";
