export class DebdepsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DebdepsError';
  }
}

/**
 * Thrown when index text is structurally malformed, e.g. a dependency
 * field before any package declaration.
 */
export class ParseError extends DebdepsError {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class BuildError extends DebdepsError {
  constructor(message: string) {
    super(message, 'BUILD_ERROR');
    this.name = 'BuildError';
  }
}

export class ConfigError extends DebdepsError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class SourceError extends DebdepsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SOURCE_ERROR', cause);
    this.name = 'SourceError';
  }
}
