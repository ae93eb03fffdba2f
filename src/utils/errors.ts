/**
 * Error description helpers shared by the fetcher, the backend and the tool invoker.
 */

interface AxiosLikeError extends Error {
  code?: string;
  response?: { status?: number; statusText?: string };
}

function isAxiosLikeError(error: Error): error is AxiosLikeError {
  return error.name === "AxiosError";
}

function describeAxiosError(axiosError: AxiosLikeError): string {
  if (axiosError.response?.status) {
    const status = axiosError.response.status;
    const statusText = axiosError.response.statusText || "Unknown error";
    if (status >= 400 && status < 500) {
      return `Client error (${status}): ${statusText}`;
    }
    if (status >= 500) {
      return `Server error (${status}): ${statusText}`;
    }
    return `HTTP error (${status}): ${statusText}`;
  }

  switch (axiosError.code) {
    case undefined:
      return `Request failed: ${axiosError.message}`;
    case "ECONNABORTED":
    case "ETIMEDOUT":
      return "Request timeout - server took too long to respond";
    case "ERR_CANCELED":
      return "Request aborted - overall timeout reached";
    case "ENOTFOUND":
      return "DNS resolution failed - domain not found";
    case "ECONNREFUSED":
      return "Connection refused - server is not accepting connections";
    case "ECONNRESET":
      return "Connection reset - network connection was interrupted";
    case "ERR_FR_TOO_MANY_REDIRECTS":
      return "Too many redirects";
    default:
      return `Network error (${axiosError.code}): ${axiosError.message}`;
  }
}

/**
 * Turns any thrown value into a one-line, human-readable reason.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Unexpected error: ${String(error)}`;
  }

  if (isAxiosLikeError(error)) {
    return describeAxiosError(error);
  }

  if (error.name === "TimeoutError" || error.message.includes("timeout")) {
    return "Request timeout - server took too long to respond";
  }

  return error.message;
}

export function errorMeta(error: unknown): Record<string, unknown> {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
