export class DewpointError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DewpointError";
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad command line. `diagnostic` is the `dewpoint: ...` line, if any;
 * `showUsage` adds the short usage line before the help hint.
 */
export class UsageError extends DewpointError {
  public readonly diagnostic: string | null;
  public readonly showUsage: boolean;

  constructor(params: { diagnostic?: string; showUsage?: boolean }) {
    super(params.diagnostic ?? "wrong number of arguments", "USAGE");
    this.name = "UsageError";
    this.diagnostic = params.diagnostic ?? null;
    this.showUsage = params.showUsage ?? false;
  }
}

export class InvalidTemperatureError extends DewpointError {
  constructor(public readonly text: string) {
    super(`invalid temperature "${text}"`, "INVALID_TEMPERATURE");
    this.name = "InvalidTemperatureError";
  }
}

export class InvalidHumidityError extends DewpointError {
  constructor(public readonly text: string) {
    super(`invalid humidity "${text}"`, "INVALID_HUMIDITY");
    this.name = "InvalidHumidityError";
  }
}

export class DewPointRangeError extends DewpointError {
  constructor(temperatureText: string, humidityText: string) {
    super(
      `no dew point for temperature "${temperatureText}" and humidity "${humidityText}"`,
      "DEW_POINT_RANGE"
    );
    this.name = "DewPointRangeError";
  }
}

export class ConfigError extends DewpointError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class InternalError extends DewpointError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INTERNAL", options);
    this.name = "InternalError";
  }
}
