/**
 * Flattens an error and its causes into one line:
 * "Failed to download gs://bucket/key: 403 Forbidden"
 */
export function formatError(error: unknown): string {
  const messages: string[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && messages.length < 5) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }
  return messages.join(": ") || "Unknown error";
}
