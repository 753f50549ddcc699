export type OperationErrorCode =
  | "not_found"
  | "empty_document"
  | "malformed_document"
  | "read_failure"
  | "write_failure"
  | "parse_failure"
  | "transport_error";

export type OperationResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: OperationErrorCode;
      message: string;
    };

export function succeed<T>(data: T): OperationResult<T> {
  return { ok: true, data };
}

export function fail<T>(errorCode: OperationErrorCode, message: string): OperationResult<T> {
  return { ok: false, error_code: errorCode, message };
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}
