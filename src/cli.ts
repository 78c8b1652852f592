/**
 * nds-tile command
 *
 * Prints level, tile number, grid position, center and bounding box for
 * packed NDS tile IDs.
 */

import { NdsTile } from "./nds/NdsTile";
import { MalformedTileIdError } from "./nds/errors";
import { stringifyFeature } from "./wgs84/geojson";
import { type LogLevel, isLogLevel, setLogLevel, createLogger } from "./log";

const log = createLogger("nds-tile");

/** Level 2 tile in the southern hemisphere */
export const DEFAULT_PACKED_IDS: readonly number[] = [262154];

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface CliOptions {
  logLevel: LogLevel;
  json: boolean;
  help: boolean;
  packedIds: string[];
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const HELP = [
  "nds-tile",
  "",
  "Usage:",
  "  nds-tile [options] [packedId ...]",
  "",
  "Options:",
  "  --log-level <level>  debug, info, warn, error or silent (default warn,",
  "                       or NDS_LOG_LEVEL)",
  "  --json               Print one JSON object per tile",
  "  -h, --help           Show help",
  "",
].join("\n");

/**
 * Parse command line arguments.
 *
 * @param args - Arguments after the executable and script path
 * @param env - Environment consulted for NDS_LOG_LEVEL
 * @throws CliUsageError on unknown flags or an invalid log level
 */
export function parseArgs(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): CliOptions {
  let logLevel = env["NDS_LOG_LEVEL"] ?? "warn";
  let json = false;
  let help = false;
  const packedIds: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    if (arg === "-h" || arg === "--help") {
      help = true;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--log-level") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new CliUsageError("--log-level requires a value");
      }
      logLevel = value;
      i++;
    } else if (arg.startsWith("--log-level=")) {
      logLevel = arg.slice("--log-level=".length);
    } else if (/^-\d/.test(arg)) {
      // negative packed IDs stand for level 15 tiles
      packedIds.push(arg);
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option ${arg}`);
    } else {
      packedIds.push(arg);
    }
  }

  const level = logLevel.toLowerCase();
  if (!isLogLevel(level)) {
    throw new CliUsageError(`Invalid log level: ${logLevel}`);
  }
  return { logLevel: level, json, help, packedIds };
}

function parsePackedId(text: string): number {
  if (!/^-?\d+$/.test(text)) {
    throw new RangeError(`Packed Tile ID ${text} is not an integer.`);
  }
  return Number(text);
}

/** Human readable tile report */
export function describeTile(tile: NdsTile): string {
  const grid = tile.gridCoordinates();
  const center = tile.center();
  return [
    `Tile ID: ${tile.packedId()}, Level: ${tile.level}, Tile Number: ${tile.tileNumber}`,
    `Tile Grid Coordinates: [${grid.col}, ${grid.row}]`,
    `Center in NDSCoordinates: ${center.longitude}, ${center.latitude}`,
    `Center: ${stringifyFeature(center.toGeoJSON())}`,
    `Bounding Box: ${stringifyFeature(tile.toGeoJSON())}`,
    "",
  ].join("\n");
}

/** Machine readable tile report */
export function tileToJson(tile: NdsTile): string {
  const center = tile.center();
  const bbox = tile.bbox();
  return JSON.stringify({
    packedId: tile.packedId(),
    level: tile.level,
    tileNumber: tile.tileNumber,
    grid: tile.gridCoordinates(),
    center: { longitude: center.longitude, latitude: center.latitude },
    bbox: {
      north: bbox.north,
      east: bbox.east,
      south: bbox.south,
      west: bbox.west,
    },
    wgs84: {
      center: center.toWgs84().toGeoJSON().geometry.coordinates,
      bbox: tile.toGeoJSON().geometry.coordinates,
    },
  });
}

/**
 * Run the command and return its exit code.
 */
export function runCli(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  output: CliOutput
): number {
  let options: CliOptions;
  try {
    options = parseArgs(args, env);
  } catch (error) {
    if (error instanceof CliUsageError) {
      output.err(`${error.message}\n\n${HELP}`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    output.out(HELP);
    return 0;
  }
  setLogLevel(options.logLevel);

  let ids: string[] = options.packedIds;
  if (ids.length === 0) {
    if (!options.json) {
      output.out("No packed IDs specified, using default values.\n\n");
    }
    ids = DEFAULT_PACKED_IDS.map(String);
  }

  let exitCode = 0;
  for (const text of ids) {
    let tile: NdsTile;
    try {
      tile = NdsTile.fromPackedId(parsePackedId(text));
    } catch (error) {
      if (
        error instanceof RangeError ||
        error instanceof MalformedTileIdError
      ) {
        output.err(`${error.message}\n`);
        exitCode = 1;
        continue;
      }
      throw error;
    }
    log.info(`Processing tile ${tile.toString()}`);
    output.out(options.json ? `${tileToJson(tile)}\n` : `${describeTile(tile)}\n`);
  }
  return exitCode;
}
