// ============================================
// Error Taxonomy
// Configuration and data errors abort startup.
// Generation errors are recovered at the orchestrator boundary.
// ============================================

export class ConfigurationError extends Error {
   constructor(message: string) {
      super(message);
      this.name = 'ConfigurationError';
   }
}

export class DataError extends Error {
   constructor(
      message: string,
      readonly source?: string
   ) {
      super(message);
      this.name = 'DataError';
   }
}

export class GenerationError extends Error {
   constructor(message: string, cause?: unknown) {
      super(message, { cause });
      this.name = 'GenerationError';
   }
}

/** Human-readable detail for logs and side channels */
export function describeError(error: unknown): string {
   if (error instanceof Error) {
      return `${error.name}: ${error.message}`;
   }
   return String(error);
}
