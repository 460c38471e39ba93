import {
  InternalError,
  InvalidHumidityError,
  InvalidTemperatureError,
  UsageError
} from "./errors.js";
import { parseStrictFloat } from "./utils/numbers.js";
import type { ArgumentToken, OptionAction, ParsedCommand, Reading, TemperatureScale } from "./types.js";

interface LongOption {
  name: string;
  action: OptionAction;
}

const CELSIUS: OptionAction = { type: "scale", scale: "celsius" };
const FAHRENHEIT: OptionAction = { type: "scale", scale: "fahrenheit" };
const HELP: OptionAction = { type: "help" };

const LONG_OPTIONS: readonly LongOption[] = [
  { name: "celsius", action: CELSIUS },
  { name: "centigrade", action: CELSIUS },
  { name: "fahrenheit", action: FAHRENHEIT },
  { name: "help", action: HELP }
];

const SHORT_OPTIONS: ReadonlyMap<string, OptionAction> = new Map([
  ["c", CELSIUS],
  ["f", FAHRENHEIT]
]);

function sameAction(a: OptionAction, b: OptionAction): boolean {
  if (a.type === "scale" && b.type === "scale") return a.scale === b.scale;
  return a.type === b.type;
}

/**
 * Resolves `--name` or `--name=value`. An exact name wins; otherwise any
 * prefix is accepted as long as every option it matches does the same thing.
 */
function matchLongOption(arg: string): OptionAction {
  const body = arg.slice(2);
  const eq = body.indexOf("=");
  const name = eq === -1 ? body : body.slice(0, eq);

  let match = LONG_OPTIONS.find((o) => o.name === name);
  if (!match) {
    const candidates = LONG_OPTIONS.filter((o) => o.name.startsWith(name));
    const [first] = candidates;
    if (!first) {
      throw new UsageError({ diagnostic: `unrecognized option '${arg}'` });
    }
    if (candidates.some((o) => !sameAction(o.action, first.action))) {
      const possibilities = candidates.map((o) => `'--${o.name}'`).join(" ");
      throw new UsageError({ diagnostic: `option '${arg}' is ambiguous; possibilities: ${possibilities}` });
    }
    match = first;
  }

  if (eq !== -1) {
    throw new UsageError({ diagnostic: `option '--${match.name}' doesn't allow an argument` });
  }
  return match.action;
}

function matchShortOption(flag: string): OptionAction {
  const action = SHORT_OPTIONS.get(flag);
  if (!action) {
    throw new UsageError({ diagnostic: `invalid option -- '${flag}'` });
  }
  return action;
}

/**
 * Splits argv into option and positional tokens, GNU getopt style: short
 * options group (`-cf`), `--` ends option processing and options may follow
 * positionals unless `posixlyCorrect` is set. Lazy, so nothing past a token
 * the caller stops at is ever examined.
 */
export function* scanArguments(
  argv: readonly string[],
  params: { posixlyCorrect: boolean }
): Generator<ArgumentToken, void, undefined> {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      for (const value of argv.slice(i + 1)) yield { type: "positional", value };
      return;
    }

    if (arg.startsWith("--")) {
      yield { type: "option", action: matchLongOption(arg) };
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      for (const flag of arg.slice(1)) {
        yield { type: "option", action: matchShortOption(flag) };
      }
      continue;
    }

    if (params.posixlyCorrect) {
      for (const value of argv.slice(i)) yield { type: "positional", value };
      return;
    }
    yield { type: "positional", value: arg };
  }
}

interface ScanState {
  readonly scale: TemperatureScale;
  readonly positionals: readonly string[];
}

function applyToken(state: ScanState, token: ArgumentToken): ScanState {
  if (token.type === "positional") {
    return { ...state, positionals: [...state.positionals, token.value] };
  }
  const { action } = token;
  switch (action.type) {
    case "scale":
      return { ...state, scale: action.scale };
    case "help":
      throw new InternalError("help option reached the option fold");
    default: {
      const unreachable: never = action;
      throw new InternalError(`unhandled option ${JSON.stringify(unreachable)}`);
    }
  }
}

export function parseCommandLine(
  argv: readonly string[],
  params: { defaultScale: TemperatureScale; posixlyCorrect: boolean }
): ParsedCommand {
  let state: ScanState = { scale: params.defaultScale, positionals: [] };

  for (const token of scanArguments(argv, params)) {
    if (token.type === "option" && token.action.type === "help") {
      return { kind: "help" };
    }
    state = applyToken(state, token);
  }

  const [temperatureText, humidityText, ...extra] = state.positionals;
  if (temperatureText === undefined || humidityText === undefined || extra.length > 0) {
    throw new UsageError({ showUsage: true });
  }

  return { kind: "compute", scale: state.scale, temperatureText, humidityText };
}

export function parseReading(temperatureText: string, humidityText: string): Reading {
  const temperature = parseStrictFloat(temperatureText);
  if (temperature === null || !Number.isFinite(temperature)) {
    throw new InvalidTemperatureError(temperatureText);
  }

  const humidity = parseStrictFloat(humidityText);
  if (humidity === null || !Number.isFinite(humidity) || humidity <= 0) {
    throw new InvalidHumidityError(humidityText);
  }

  return { temperature, humidity };
}
