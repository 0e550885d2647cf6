/**
 * API Request/Response Types
 */

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export interface HealthResponse {
  /** Source store reachable AND graph store reachable */
  ok: boolean;
}
