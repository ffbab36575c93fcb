import { Classification, FailureReason, ParsedBody, RawResponse, ValidationRules } from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'string') return value.trim().length > 0;
  if (isObject(value)) return Object.keys(value).length > 0;
  return true;
}

function errorText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (isObject(value) && typeof value.message === 'string') return value.message;
  return JSON.stringify(value) ?? 'Unknown error';
}

function fail(reason: FailureReason): Classification {
  return { ok: false, reason };
}

function reportedError(body: JsonObject, metadata: unknown, rules: ValidationRules): string | undefined {
  if (rules.metadataStatusField && isObject(metadata)) {
    const status = metadata[rules.metadataStatusField];
    if (status !== undefined && status === (rules.metadataErrorStatus ?? 'error')) {
      const detail = rules.metadataErrorField ? metadata[rules.metadataErrorField] : undefined;
      return detail === undefined ? 'Unknown error' : errorText(detail);
    }
  }

  for (const field of rules.errorFields ?? []) {
    if (field in body && isNonEmpty(body[field])) {
      return errorText(body[field]);
    }
  }

  return undefined;
}

function hasResult(body: JsonObject, rules: ValidationRules): boolean {
  if (rules.resultFields.some(field => isNonEmpty(body[field]))) {
    return true;
  }

  // Engines that answer with their own result shape still count, as long as
  // something beyond the envelope came back.
  const ignored = new Set([
    rules.metadataField,
    ...(rules.envelopeFields ?? []),
    ...(rules.errorFields ?? []),
    ...rules.resultFields,
  ]);
  return Object.entries(body).some(([key, value]) => !ignored.has(key) && isNonEmpty(value));
}

/**
 * Maps a raw response to success or the earliest failing check:
 * transport, status, parse, missing metadata, reported error, empty result.
 */
export function classifyResponse(raw: RawResponse, rules: ValidationRules): Classification {
  if (raw.transportError) {
    return fail({ kind: 'transport', transport: raw.transportError.kind, message: raw.transportError.message });
  }

  if (raw.status !== 200) {
    return fail({ kind: 'status', status: raw.status ?? 0 });
  }

  const body: ParsedBody = raw.body ?? { ok: false, error: 'Empty response body' };
  if (!body.ok) {
    return fail({ kind: 'parse', message: body.error });
  }
  if (!isObject(body.value)) {
    return fail({ kind: 'parse', message: 'Response is not a JSON object' });
  }

  const value = body.value;
  if (!(rules.metadataField in value)) {
    return fail({ kind: 'missing-metadata', field: rules.metadataField });
  }

  const reported = reportedError(value, value[rules.metadataField], rules);
  if (reported !== undefined) {
    return fail({ kind: 'reported-error', message: reported });
  }

  if (!hasResult(value, rules)) {
    return fail({ kind: 'empty-result' });
  }

  return { ok: true };
}

/** Stable key used to count failures. */
export function reasonCode(reason: FailureReason): string {
  switch (reason.kind) {
    case 'transport':
      return `transport:${reason.transport}`;
    case 'status':
      return `http:${reason.status}`;
    case 'parse':
      return 'parse-error';
    default:
      return reason.kind;
  }
}

export function describeReason(reason: FailureReason): string {
  switch (reason.kind) {
    case 'transport':
      return reason.message ? `${reason.transport}: ${reason.message}` : reason.transport;
    case 'status':
      return reason.status > 0 ? `HTTP ${reason.status}` : 'No HTTP status';
    case 'parse':
      return `Invalid JSON response: ${reason.message}`;
    case 'missing-metadata':
      return `Missing ${reason.field}`;
    case 'reported-error':
      return `Reported error: ${reason.message}`;
    case 'empty-result':
      return 'No results found';
    case 'cancelled':
      return 'Cancelled before dispatch';
    case 'internal':
      return `Internal error: ${reason.message}`;
  }
}
