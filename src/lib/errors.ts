export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Failed news search. `status` is 0 when the API never replied. Fatal for the whole request. */
export class NewsApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'NewsApiError';
    this.status = status;
  }
}

/** Failed chat completion call. `status` is absent when the request never got a reply. */
export class CompletionError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'CompletionError';
    this.status = status;
  }
}
