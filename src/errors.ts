export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Body bytes that are not valid UTF-8
export class BodyDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BodyDecodeError';
  }
}

// Client went away before the declared body arrived
export class RequestAbortedError extends Error {
  constructor(method: string, path: string) {
    super(`Request aborted: ${method} ${path}`);
    this.name = 'RequestAbortedError';
  }
}
