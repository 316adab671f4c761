import { parseArgs } from "util";
import { ROTATOR_CONFIG } from "./rotator-config";

export interface CliArgs {
  file: string;
  port: number;
  seed?: number;
}

export const USAGE = `Usage: banner-rotator <FILE> [-p|--port <port>] [--seed <int>]

  FILE         Banners config as CSV (url;impressions;category...)
  -p, --port   Listening HTTP port (default ${ROTATOR_CONFIG.server.defaultPort})
  --seed       Seed for reproducible banner draws`;

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}

const parseInteger = (name: string, raw: string, min: number, max: number): number => {
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || value < min || value > max) {
    throw new CliArgsError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
};

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        port: { type: "string", short: "p" },
        seed: { type: "string" },
      },
    });
  } catch (error) {
    // Unknown flags and missing option values
    throw new CliArgsError(error instanceof Error ? error.message : String(error));
  }
};

export const parseCliArgs = (argv: string[]): CliArgs => {
  const { values, positionals } = readArgs(argv);
  if (positionals.length !== 1) {
    throw new CliArgsError("exactly one banners config FILE is required");
  }

  return {
    file: positionals[0],
    port:
      values.port === undefined
        ? ROTATOR_CONFIG.server.defaultPort
        : parseInteger("port", values.port, 1, 65535),
    seed:
      values.seed === undefined
        ? undefined
        : parseInteger("seed", values.seed, 0, 0xffffffff),
  };
};
