/**
 * Helpers for turning unknown thrown values into loggable data.
 */

export class ErrorHandler {
  /**
   * Safe message extraction from an unknown thrown value
   */
  static extractMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    return 'Unknown error occurred';
  }

  static extractStack(error: unknown): string | undefined {
    return error instanceof Error ? error.stack : undefined;
  }

  /**
   * Builds the pino context for a fault, keeping Error instances under `err`
   * so the standard serializer picks them up.
   */
  static toLogContext(
    error: unknown,
    data?: Record<string, unknown>,
  ): Record<string, unknown> {
    if (error instanceof Error) {
      return { ...data, err: error };
    }
    return { ...data, error: ErrorHandler.extractMessage(error) };
  }
}
