import { z } from "zod";

// Shape of the error body the Google APIs return, as carried on a GaxiosError
const googleErrorSchema = z.object({
  response: z.object({
    status: z.number().optional(),
    data: z.object({
      error: z.object({
        code: z.number().optional(),
        message: z.string().optional(),
        errors: z
          .array(z.object({ reason: z.string().optional(), message: z.string().optional() }))
          .optional(),
      }),
    }),
  }),
});

export interface ApiErrorInfo {
  status?: number;
  reason?: string;
  message: string;
}

export function describeApiError(err: unknown): ApiErrorInfo {
  const parsed = googleErrorSchema.safeParse(err);
  if (parsed.success) {
    const { status, data } = parsed.data.response;
    const first = data.error.errors?.[0];
    return {
      status: status ?? data.error.code,
      reason: first?.reason,
      message: data.error.message ?? first?.message ?? fallbackMessage(err),
    };
  }
  return { message: fallbackMessage(err) };
}

const FRIENDLY_REASONS: Record<string, string> = {
  commentsDisabled: "Comments are disabled on this video.",
  quotaExceeded: "YouTube API quota exceeded. Try again tomorrow.",
  dailyLimitExceeded: "YouTube API quota exceeded. Try again tomorrow.",
  videoNotFound: "Video not found.",
  channelNotFound: "Channel not found.",
  forbidden: "Access denied. Check that the token has the required scopes.",
  insufficientPermissions: "Access denied. Check that the token has the required scopes.",
};

/**
 * User-facing one-liner for a remote-service error.
 */
export function friendlyApiError(err: unknown): string {
  const info = describeApiError(err);
  if (info.reason && FRIENDLY_REASONS[info.reason]) {
    return FRIENDLY_REASONS[info.reason];
  }
  return info.status ? `YouTube API error (${info.status}): ${info.message}` : info.message;
}

/**
 * True for remote-service errors that a command reports and moves past.
 */
export function isApiError(err: unknown): boolean {
  return googleErrorSchema.safeParse(err).success;
}

function fallbackMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
