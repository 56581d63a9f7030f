/**
 * Formats an unknown error into a string message.
 * Handles Error instances and falls back to String().
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
