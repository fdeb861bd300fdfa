import { isPlainObject } from "../lib/utils";

/**
 * One entry of the `Fault.Error` list the API returns on failure
 */
export interface QboFaultDetail {
  message?: string;
  detail?: string;
  code?: string;
  element?: string;
}

/**
 * Parsed `Fault` body
 */
export interface QboFault {
  type?: string;
  errors: QboFaultDetail[];
}

export interface QboErrorOptions {
  fault?: QboFault;
  intuitTid?: string;
  cause?: unknown;
}

/**
 * Base class for every error raised by this SDK
 */
export class QboError extends Error {
  public readonly fault?: QboFault;
  public readonly intuitTid?: string;

  constructor(message: string, options: QboErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "QboError";
    this.fault = options.fault;
    this.intuitTid = options.intuitTid;
  }
}

/**
 * Caller configuration bug: missing credentials, missing realm, bad env value.
 * Never retried.
 */
export class ConfigurationError extends QboError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A caller passed a value the SDK cannot act on, e.g. an unsupported verb
 */
export class InvalidArgumentError extends QboError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Raised while unwrapping an envelope that does not have the expected shape.
 * The normalizer contains it; callers only see it as the cause of a
 * {@link ResponseParseError} in strict mode.
 */
export class ResponseShapeError extends QboError {
  constructor(message: string) {
    super(message);
    this.name = "ResponseShapeError";
  }
}

/**
 * Thrown in strict mode when a response could not be parsed or unwrapped
 */
export class ResponseParseError extends QboError {
  constructor(
    message: string,
    public readonly partial: unknown,
    cause: unknown,
  ) {
    super(message, { cause });
    this.name = "ResponseParseError";
  }
}

export interface QboHttpErrorOptions extends QboErrorOptions {
  status: number;
  statusText?: string;
  body?: unknown;
  method?: string;
  url?: string;
}

/**
 * Non-success HTTP status returned by the API
 */
export class QboHttpError extends QboError {
  public readonly status: number;
  public readonly statusText?: string;
  public readonly body?: unknown;
  public readonly method?: string;
  public readonly url?: string;

  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "QboHttpError";
    this.status = options.status;
    this.statusText = options.statusText;
    this.body = options.body;
    this.method = options.method;
    this.url = options.url;
  }
}

export class BadRequestError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "BadRequestError";
  }
}

export class UnauthorizedError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

export class TooManyRequestsError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "TooManyRequestsError";
  }
}

export class InternalServerError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "InternalServerError";
  }
}

export class ServiceUnavailableError extends QboHttpError {
  constructor(message: string, options: QboHttpErrorOptions) {
    super(message, options);
    this.name = "ServiceUnavailableError";
  }
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Extract the `Fault` block from a decoded error body.
 * Accepts both `{ Fault: {...} }` and the lower-case `fault` some endpoints use.
 */
export function extractFault(body: unknown): QboFault | undefined {
  if (!isPlainObject(body)) return undefined;

  const fault = body.Fault ?? body.fault;
  if (!isPlainObject(fault)) return undefined;

  const rawErrors = fault.Error ?? fault.error;
  const errors: QboFaultDetail[] = [];
  if (Array.isArray(rawErrors)) {
    for (const entry of rawErrors) {
      if (!isPlainObject(entry)) continue;
      errors.push({
        message: optionalString(entry.Message ?? entry.message),
        detail: optionalString(entry.Detail ?? entry.detail),
        code: optionalString(entry.code ?? entry.Code),
        element: optionalString(entry.element ?? entry.Element),
      });
    }
  }

  return { type: optionalString(fault.type ?? fault.Type), errors };
}

/**
 * Human-readable summary of a fault, one `message: detail` per error
 */
export function formatFault(fault: QboFault): string {
  return fault.errors
    .map((error) => {
      const parts = [error.message, error.detail].filter(Boolean).join(": ");
      return error.code ? `${parts} (code ${error.code})` : parts;
    })
    .filter((line) => line.length > 0)
    .join("; ");
}

type HttpErrorConstructor = new (
  message: string,
  options: QboHttpErrorOptions,
) => QboHttpError;

function errorClassFor(status: number, body: unknown): HttpErrorConstructor {
  switch (status) {
    case 400:
      return BadRequestError;
    case 401:
      return UnauthorizedError;
    case 403: {
      const text = typeof body === "string" ? body : JSON.stringify(body ?? "");
      return text.includes("ThrottleExceeded")
        ? TooManyRequestsError
        : ForbiddenError;
    }
    case 404:
      return NotFoundError;
    case 429:
      return TooManyRequestsError;
    case 500:
      return InternalServerError;
    case 502:
    case 503:
    case 504:
      return ServiceUnavailableError;
    default:
      return QboHttpError;
  }
}

/**
 * Build the typed error for a non-success response. `options.body` is the
 * decoded body when it was JSON, the raw text otherwise.
 */
export function createHttpError(
  options: Omit<QboHttpErrorOptions, "fault">,
): QboHttpError {
  const fault = extractFault(options.body);
  const summary = fault ? formatFault(fault) : "";
  const statusLine = [options.status, options.statusText]
    .filter(Boolean)
    .join(" ");
  const target = options.method && options.url
    ? ` for ${options.method.toUpperCase()} ${options.url}`
    : "";
  const message = summary
    ? `HTTP ${statusLine}${target}: ${summary}`
    : `HTTP ${statusLine}${target}`;

  const ErrorClass = errorClassFor(options.status, options.body);
  return new ErrorClass(message, { ...options, fault });
}
