// Thrown at startup when run options or configuration break the contract.
export class ConfigError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

// The payload is valid HTML/JSON but not a feed container at all.
export class ParseError extends Error {
  constructor(message: string, public code: string = 'UNRECOGNIZED_PAYLOAD') {
    super(message);
    this.name = 'ParseError';
  }
}

export class RetryBudgetExhaustedError extends Error {
  constructor(message: string, public attempts: number) {
    super(message);
    this.name = 'RetryBudgetExhaustedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
