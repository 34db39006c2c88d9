export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message?: string) {
    super(message ?? code);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

/**
 * 创建带 status/code 的 HTTP 错误。
 */
export function httpError(status: number, code: string, message?: string): HttpError {
  return new HttpError(status, code, message);
}
