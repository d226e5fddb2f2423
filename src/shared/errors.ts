export enum AdminErrorCode {
  VALIDATION_ERROR = "VALIDATION_ERROR",
  SUBSYSTEM_UNAVAILABLE = "SUBSYSTEM_UNAVAILABLE",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  NOT_FOUND = "NOT_FOUND",
  CONFIG_ERROR = "CONFIG_ERROR",
  MANIFEST_UNREADABLE = "MANIFEST_UNREADABLE",
}

export class AdminError extends Error {
  readonly code: AdminErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: AdminErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "AdminError";
    this.code = code;
    this.context = context;
  }
}

export function isAdminError(err: unknown, code?: AdminErrorCode): err is AdminError {
  return err instanceof AdminError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
