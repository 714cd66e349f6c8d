/**
 * Error categories shared by the fetchers, the issue-action service and the HTTP layer.
 *
 * `not_found` exists for callers that need to reject a request; the fetchers themselves
 * represent a missing issue as a snapshot value rather than raising it.
 */
export type DashboardErrorCode =
  | 'remote_unavailable'
  | 'not_found'
  | 'configuration_gap'
  | 'transition_unreachable'
  | 'authorization_denied'
  | 'invalid_request';

const defaultStatusByCode: Readonly<Record<DashboardErrorCode, number>> = {
  remote_unavailable: 502,
  not_found: 404,
  configuration_gap: 409,
  transition_unreachable: 422,
  authorization_denied: 403,
  invalid_request: 400,
};

export class DashboardError extends Error {
  readonly status: number;
  readonly code: DashboardErrorCode;

  constructor(params: {
    code: DashboardErrorCode;
    message: string;
    status?: number;
    cause?: unknown;
  }) {
    super(params.message);
    this.name = 'DashboardError';
    this.code = params.code;
    this.status = params.status ?? defaultStatusByCode[params.code];
    if (params.cause !== undefined)
      (this as unknown as { cause?: unknown }).cause = params.cause;
  }
}

export function isDashboardError(err: unknown): err is DashboardError {
  return err instanceof DashboardError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
