export type ReportErrorCode = "input_format" | "validation" | "render" | "upstream_generation" | "config";

export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ReportErrorCode, statusCode: number, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Wrong file type, or a CSV that cannot be read at all. */
export class InputFormatError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "input_format", 400, details);
  }
}

/** Readable input that is missing required columns or rows, or carries out-of-range values. */
export class ValidationError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "validation", 400, details);
  }
}

export class RenderError extends ReportError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, "render", 500, options?.details);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export type UpstreamDetails = {
  status: number;
  code: string;
  type: string;
  requestId: string;
  message: string;
};

export class UpstreamGenerationError extends ReportError {
  readonly upstream: UpstreamDetails;

  constructor(message: string, upstream?: Partial<UpstreamDetails>, cause?: unknown) {
    const merged: UpstreamDetails = {
      status: upstream?.status ?? 0,
      code: upstream?.code ?? "",
      type: upstream?.type ?? "",
      requestId: upstream?.requestId ?? "",
      message: upstream?.message ?? message
    };
    super(message, "upstream_generation", 502, { ...merged });
    this.upstream = merged;
    if (cause !== undefined) this.cause = cause;
  }
}

export class ConfigError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "config", 500, details);
  }
}

/** Pulls status/code/type out of SDK errors without trusting their shape. */
export function describeUpstreamError(err: unknown): UpstreamDetails {
  const record = isRecord(err) ? err : {};
  const nested = isRecord(record.error) ? record.error : {};
  const response = isRecord(record.response) ? record.response : {};
  return {
    status: Number(record.status || response.status || 0),
    code: String(record.code || nested.code || ""),
    type: String(record.type || nested.type || ""),
    requestId: String(record.request_id || record.requestId || ""),
    message: String(nested.message || record.message || "Upstream error")
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
