// Fatal startup errors are thrown as `new Error(CODE)`

const ERROR_MESSAGES: Record<string, string> = {
  NO_BATTERY: 'No battery found. There is nothing to monitor on this machine.',
  INVALID_CONFIG: 'Invalid configuration, check the BATTRACK_* environment variables.',
  NO_TTY: 'The interactive view needs a terminal. Use --record to sample in the background.',
};

export function isKnownError(error: unknown): boolean {
  return error instanceof Error && error.message in ERROR_MESSAGES;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return ERROR_MESSAGES[error.message] ?? error.message;
  }
  return String(error);
}
