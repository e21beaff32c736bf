export type ErrorKind =
  | "NotFound"
  | "PermissionDenied"
  | "TypeMismatch"
  | "ValidationFailed"
  | "AlreadyExists"
  | "SerializationError";

export interface ReplicationError {
  kind: ErrorKind;
  message: string;
}

export type Result<T> = { ok: true; data: T } | { ok: false; error: ReplicationError };

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function err<T = never>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function formatError(e: ReplicationError): string {
  return `${e.kind}: ${e.message}`;
}

// HTTP-код для админского API
export const ERROR_HTTP_STATUS: Record<ErrorKind, number> = {
  NotFound: 404,
  PermissionDenied: 403,
  TypeMismatch: 422,
  ValidationFailed: 422,
  AlreadyExists: 409,
  SerializationError: 400,
};
