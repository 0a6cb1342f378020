/**
 * Failure of the backend completion call: network error, timeout, non-2xx
 * status or an error body. `status` is the backend's status (504 when no
 * response arrived) and is only reported in logs.
 */
export class BackendError extends Error {
  readonly status: number;
  readonly responseBody: string | undefined;

  constructor(message: string, status: number, responseBody?: string) {
    super(message);
    this.name = 'BackendError';
    this.status = status;
    this.responseBody = responseBody;
  }
}
