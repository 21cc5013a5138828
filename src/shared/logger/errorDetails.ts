/**
 * Flattens a thrown value into plain fields; pino prints bare `Error` objects as `{}`.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
