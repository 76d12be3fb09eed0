export type ErrorContext = Record<string, unknown>;

export class ToolError extends Error {
  public code: string;
  public exitCode: number;
  public context: ErrorContext;

  constructor(message: string, code: string, exitCode = 1, context: ErrorContext = {}) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIG', 2, context);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONNECTION', 1, context);
    this.name = 'ConnectionError';
  }
}

export class CatalogQueryError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CATALOG_QUERY', 1, context);
    this.name = 'CatalogQueryError';
  }
}

export class DumpToolError extends ToolError {
  public stderr: string;

  constructor(message: string, stderr = '', context?: ErrorContext) {
    super(message, 'DUMP_TOOL', 1, context);
    this.name = 'DumpToolError';
    this.stderr = stderr;
  }
}

export type CopySide = 'source' | 'target';

export class TableCopyError extends ToolError {
  public side: CopySide;

  constructor(message: string, side: CopySide, context?: ErrorContext) {
    super(message, 'TABLE_COPY', 1, { side, ...context });
    this.name = 'TableCopyError';
    this.side = side;
  }
}

export class ScriptApplyError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'SCRIPT_APPLY', 1, context);
    this.name = 'ScriptApplyError';
  }
}

export class CloudflareApiError extends ToolError {
  public status?: number;

  constructor(message: string, status?: number, context?: ErrorContext) {
    super(message, 'CLOUDFLARE_API', 1, { status, ...context });
    this.name = 'CloudflareApiError';
    this.status = status;
  }
}

export class IpLookupError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'IP_LOOKUP', 1, context);
    this.name = 'IpLookupError';
  }
}

export class TimeoutError extends ToolError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'TIMEOUT', 1, context);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  return err instanceof ToolError ? err.exitCode : 1;
}
