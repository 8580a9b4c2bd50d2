/** Envelope for every JSON body the HTTP API returns, apart from health and status. */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  /** Echoes the `x-request-id` response header. */
  requestId: string;
  details?: unknown;
}
