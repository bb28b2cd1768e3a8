export class DataFetchError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DataFetchError';
  }
}

export class OrderCancellationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'OrderCancellationError';
  }
}

export class UnsupportedExchangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedExchangeError';
  }
}

export class MissingEnvironmentVariableError extends Error {
  constructor(public readonly variable: string) {
    super(`Missing required environment variable: ${variable}`);
    this.name = 'MissingEnvironmentVariableError';
  }
}

export class HistoricalDataFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`Failed to load OHLCV data from file: ${filePath}`);
    this.name = 'HistoricalDataFileNotFoundError';
  }
}

export class UnsupportedOperationError extends Error {
  constructor(operation: string, mode: string) {
    super(`${operation} is not available in ${mode} mode`);
    this.name = 'UnsupportedOperationError';
  }
}
