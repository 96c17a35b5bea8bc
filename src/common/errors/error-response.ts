export interface ErrorBody {
  error: {
    code: string;
    message: string;
    timestamp: string;
    path: string;
    details?: Record<string, unknown>;
  };
}

export function buildErrorBody(
  code: string,
  message: string,
  path: string,
  details?: Record<string, unknown>,
): ErrorBody {
  return {
    error: {
      code,
      message,
      timestamp: new Date().toISOString(),
      path,
      details,
    },
  };
}
