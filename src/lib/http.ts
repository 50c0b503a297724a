export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/** Throttling and server-side errors are worth another attempt; other 4xx are not. */
export function isRetryableStatus(statusCode: number): boolean {
  if (statusCode === 408 || statusCode === 429) return true;
  return statusCode >= 500 && statusCode < 600;
}

export function isTextualContentType(contentType: string | null): boolean {
  // Some listing endpoints omit the header entirely.
  if (!contentType) return true;
  const type = contentType.toLowerCase();
  return (
    type.includes("html") ||
    type.includes("xml") ||
    type.includes("json") ||
    type.startsWith("text/")
  );
}
