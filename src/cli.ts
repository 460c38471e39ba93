import type { AppConfig } from "./config.js";
import { parseCommandLine, parseReading } from "./args.js";
import { ConfigError, DewPointRangeError, DewpointError, InternalError, UsageError } from "./errors.js";
import { loadHelpTemplate } from "./help/helpTemplate.js";
import { defaultScaleForLocale, localeUsesFahrenheit } from "./locale.js";
import type { OutputSink } from "./types.js";
import { logger } from "./utils/logger.js";
import { roundToInt32 } from "./utils/numbers.js";
import { dewPointC, dewPointF } from "./utils/psychrometrics.js";

export const PROGRAM_NAME = "dewpoint";
export const SHORT_USAGE = "Usage: dewpoint TEMPERATURE HUMIDITY\n";
export const ASK_FOR_HELP = "Try 'dewpoint --help' for more information\n";

export function renderError(err: DewpointError): string {
  if (err instanceof InternalError) {
    return "Internal error; please report.\n";
  }
  if (err instanceof ConfigError) {
    return `${PROGRAM_NAME}: ${err.message}\n`;
  }
  if (err instanceof UsageError) {
    const diagnostic = err.diagnostic ? `${PROGRAM_NAME}: ${err.diagnostic}\n` : "";
    return `${diagnostic}${err.showUsage ? SHORT_USAGE : ""}${ASK_FOR_HELP}`;
  }
  return `${PROGRAM_NAME}: ${err.message}\n${ASK_FOR_HELP}`;
}

function renderHelp(cfg: AppConfig): string {
  const template = loadHelpTemplate(cfg.DEWPOINT_HELP_TEMPLATE_PATH);
  return template.render({
    locale: cfg.MEASUREMENT_LOCALE,
    defaultScale: localeUsesFahrenheit(cfg.MEASUREMENT_LOCALE) ? "Fahrenheit" : "Celsius"
  });
}

function execute(argv: readonly string[], cfg: AppConfig, io: OutputSink): void {
  const defaultScale = defaultScaleForLocale(cfg.MEASUREMENT_LOCALE);
  logger.debug({ locale: cfg.MEASUREMENT_LOCALE, default_scale: defaultScale }, "Resolved measurement locale");

  const command = parseCommandLine(argv, { defaultScale, posixlyCorrect: cfg.POSIXLY_CORRECT });
  if (command.kind === "help") {
    io.stdout(renderHelp(cfg));
    return;
  }

  const { temperature, humidity } = parseReading(command.temperatureText, command.humidityText);
  const dewPoint =
    command.scale === "fahrenheit" ? dewPointF(temperature, humidity) : dewPointC(temperature, humidity);
  logger.debug({ scale: command.scale, temperature, humidity, dew_point: dewPoint }, "Computed dew point");

  const rounded = roundToInt32(dewPoint);
  if (rounded === null) {
    throw new DewPointRangeError(command.temperatureText, command.humidityText);
  }
  io.stdout(`${rounded}\n`);
}

/**
 * Runs one invocation and returns the process exit code. Standard output gets
 * either the help text or the rounded dew point; every failure goes to `io.stderr`.
 */
export function runDewpoint(argv: readonly string[], params: { config: AppConfig; io: OutputSink }): number {
  logger.level = params.config.LOG_LEVEL;
  try {
    execute(argv, params.config, params.io);
    return 0;
  } catch (err) {
    if (err instanceof DewpointError) {
      logger.debug({ code: err.code }, err.message);
      params.io.stderr(renderError(err));
      return 1;
    }
    logger.error({ err }, "Unexpected failure");
    params.io.stderr(renderError(new InternalError("unexpected failure", { cause: err })));
    return 1;
  }
}
