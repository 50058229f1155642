import { ErrorMapper } from '../../types/http';
import { isJsonObject, readString } from '../../utils/json';

/**
 * Covers the common shapes: `{ message }`, `{ error: "..." }`,
 * `{ error: { type, message } }` (Airtable) and `{ code, message }` (Notion).
 */
export const defaultErrorMapper: ErrorMapper = {
  fromResponse(status, payload, rawText) {
    if (isJsonObject(payload)) {
      const nested = payload.error;
      if (isJsonObject(nested)) {
        return {
          message: readString(nested, 'message') ?? readString(nested, 'type') ?? 'Unknown error',
          code: readString(nested, 'type'),
          details: payload,
        };
      }

      return {
        message: readString(payload, 'message') ?? readString(payload, 'error') ?? 'Unknown error',
        code: readString(payload, 'code'),
        details: payload,
      };
    }

    return { message: rawText.trim() || `HTTP ${status}`, details: rawText };
  },
};

export const hubspotErrorMapper: ErrorMapper = {
  fromResponse(status, payload, rawText) {
    if (!isJsonObject(payload)) {
      return defaultErrorMapper.fromResponse(status, payload, rawText);
    }

    return {
      message: readString(payload, 'message') ?? 'Unknown error',
      code: readString(payload, 'category'),
      details: {
        errors: Array.isArray(payload.errors) ? payload.errors : [],
        correlationId: readString(payload, 'correlationId'),
      },
    };
  },
};

const SLACK_ERROR_EXPLANATIONS: Record<string, string> = {
  not_authed: 'No authentication token provided',
  invalid_auth: 'Invalid authentication token',
  account_inactive: 'User account is inactive',
  token_revoked: 'Token has been revoked',
  no_permission: 'Token does not have required scope',
  missing_scope: 'Token is missing a required scope',
  channel_not_found: 'Channel does not exist or you lack access',
  user_not_found: 'User does not exist',
  message_not_found: 'Message does not exist',
  cant_delete_message: 'Cannot delete this message (not yours or too old)',
  rate_limited: 'Too many requests - wait and retry',
  fatal_error: 'Server error - retry later',
};

export function explainSlackError(code: string): string {
  return SLACK_ERROR_EXPLANATIONS[code] ?? `Unknown error: ${code}`;
}

/** Slack answers HTTP 200 with `ok: false` for most failures. */
export const slackErrorMapper: ErrorMapper = {
  fromResponse(status, payload, rawText) {
    return { message: `HTTP ${status}`, details: isJsonObject(payload) ? payload : rawText };
  },

  fromBody(payload) {
    if (!isJsonObject(payload)) {
      return { message: 'Invalid JSON response', code: 'invalid_response' };
    }
    if (payload.ok === true) {
      return null;
    }

    const code = readString(payload, 'error') ?? 'unknown_error';
    return { message: `${code}: ${explainSlackError(code)}`, code, details: payload };
  },
};

function graphqlMessages(errors: unknown[]): string {
  return errors
    .map((entry) => readString(entry, 'message') ?? JSON.stringify(entry))
    .join('; ');
}

/** GraphQL reports failures in an `errors` array next to (or instead of) `data`. */
export const graphqlErrorMapper: ErrorMapper = {
  fromResponse(status, payload, rawText) {
    if (isJsonObject(payload) && Array.isArray(payload.errors) && payload.errors.length > 0) {
      return { message: graphqlMessages(payload.errors), details: payload.errors };
    }
    return defaultErrorMapper.fromResponse(status, payload, rawText);
  },

  fromBody(payload) {
    if (isJsonObject(payload) && Array.isArray(payload.errors) && payload.errors.length > 0) {
      const first: unknown = payload.errors[0];
      const code = isJsonObject(first) ? readString(first.extensions, 'code') : undefined;
      return { message: graphqlMessages(payload.errors), code, details: payload.errors };
    }
    return null;
  },
};
