#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import { getPosition } from "./position.js";
import type { SunPosition } from "./position.js";
import { toDegrees } from "./angles.js";
import { parseOrThrow } from "./validation.js";

const USAGE = 'Usage: sun-position "<YYYY-MM-DD HH:mm:ss>" <latitude> <longitude> [--degrees]';

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const numberArg = z
  .string()
  .trim()
  .min(1, "Required")
  .regex(DECIMAL, "Expected a decimal number")
  .pipe(z.coerce.number().finite());

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

interface CliArgs {
  dateText: string;
  latitude: number;
  longitude: number;
  degrees: boolean;
}

/** Reads `YYYY-MM-DD HH:mm:ss` as a UTC wall-clock time. */
export function parseDateTime(text: string): Date {
  const match = DATE_TIME.exec(text.trim());
  if (!match) {
    throw new InvalidInputError("date", `expected YYYY-MM-DD HH:mm:ss, got "${text}"`);
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // 2025-02-30 rolls over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new InvalidInputError("date", `not a calendar date: "${text}"`);
  }
  return date;
}

export function formatPosition(
  dateText: string,
  latitude: number,
  longitude: number,
  pos: SunPosition,
  degrees = false,
): string {
  const unit = degrees ? "°" : " rad";
  const show = (value: number) => `${degrees ? toDegrees(value) : value}${unit}`;
  return [
    `On ${dateText}, at latitude ${latitude} and longitude ${longitude}, the sun is at`,
    `  a) azimuth: ${show(pos.azimuth)}`,
    `  b) altitude: ${show(pos.altitude)}`,
  ].join("\n");
}

function parseArgs(argv: string[]): CliArgs {
  const degrees = argv.includes("--degrees");
  const positional = argv.filter((arg) => arg !== "--degrees");
  if (positional.length !== 3) {
    throw new InvalidInputError("arguments", USAGE);
  }
  const [dateText, lat, lng] = positional;
  return {
    dateText,
    latitude: parseOrThrow(numberArg, lat, "latitude"),
    longitude: parseOrThrow(numberArg, lng, "longitude"),
    degrees,
  };
}

/** Runs the command for `argv` (without node and script path); returns the exit code. */
export function runCli(
  argv: string[],
  io: CliIo = { out: (line) => console.log(line), err: (line) => console.error(line) },
): number {
  try {
    const { dateText, latitude, longitude, degrees } = parseArgs(argv);
    const pos = getPosition(parseDateTime(dateText), latitude, longitude);
    io.out(formatPosition(dateText, latitude, longitude, pos, degrees));
    return 0;
  } catch (err) {
    if (err instanceof Error) {
      io.err(`[sun-position] ${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

/**
 * True when `argv1` (the script path node was given, possibly a symlink such
 * as `node_modules/.bin/sun-position`) resolves to the module at `url`.
 */
export function isDirectRun(argv1: string | undefined, url: string): boolean {
  if (!argv1) return false;
  return pathToFileURL(realpathSync(argv1)).href === url;
}

if (isDirectRun(process.argv[1], import.meta.url)) {
  process.exitCode = runCli(process.argv.slice(2));
}
