/** The stream does not open with a valid enter record; nothing was decoded. */
export class TraceFramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TraceFramingError";
  }
}

/** Too many consecutive lines could not be routed to a thread. */
export class StreamCorruptedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StreamCorruptedError";
  }
}

/** Ends the session that raised it; other sessions keep decoding. */
export class TraceDecodeError extends Error {
  readonly functionName: string;

  constructor(message: string, functionName = "") {
    super(functionName ? `${functionName}: ${message}` : message);
    this.name = "TraceDecodeError";
    this.functionName = functionName;
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(message: string, configPath: string) {
    super(`${configPath}: ${message}`);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}
