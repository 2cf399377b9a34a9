import { parseArgs } from "node:util";
import { UsageError, isParseArgsError } from "./errors";

const OPTIONS = {
  algo: { type: "string" },
  in: { type: "string" },
  shift: { type: "string" },
  out: { type: "string" },
  verbose: { type: "boolean", short: "v" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
} as const;

const VALUE_OPTIONS = Object.entries(OPTIONS)
  .filter(([, option]) => option.type === "string")
  .map(([name]) => `--${name}`);

const KNOWN_FLAGS = new Set(
  Object.entries(OPTIONS).flatMap(([name, option]) =>
    "short" in option ? [`--${name}`, `-${option.short}`] : [`--${name}`]
  )
);

export interface ParsedArgs {
  command: string | undefined;
  algo: string | undefined;
  input: string | undefined;
  shift: string | undefined;
  out: string | undefined;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Glue `--shift -3` into `--shift=-3` so values may start with a dash.
 */
function attachDashedValues(argv: string[]): string[] {
  const result: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (VALUE_OPTIONS.includes(arg) && next !== undefined && next.startsWith("-") && !KNOWN_FLAGS.has(next)) {
      result.push(`${arg}=${next}`);
      i++;
      continue;
    }

    result.push(arg);
  }

  return result;
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  try {
    const { values, positionals } = parseArgs({
      args: attachDashedValues(argv),
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });

    if (positionals.length > 1) {
      throw new UsageError(`Unexpected argument '${positionals[1]}'`);
    }

    return {
      command: positionals[0],
      algo: values.algo,
      input: values.in,
      shift: values.shift,
      out: values.out,
      verbose: values.verbose ?? false,
      help: values.help ?? false,
      version: values.version ?? false,
    };
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}
