export type ErrorDetails = {
  name?: string;
  message: string;
  /** Node system error code such as "EACCES", when present. */
  code?: string;
  stack?: string;
};

export const toErrorDetails = (error: unknown): ErrorDetails => {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
