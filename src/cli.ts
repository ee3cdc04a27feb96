#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { computeShortestPaths, type ShortestPaths } from "./apsp.js";
import { loadApspConfig } from "./config/apsp.js";
import { normaliseApspError } from "./errors.js";
import { graphFromDescriptor, parseGraphDescriptor, type DescriptorLabel } from "./graph/descriptor.js";
import type { UndirectedGraph } from "./graph/model.js";
import { StructuredLogger, type LogSink } from "./logger.js";

type OutputFormat = "text" | "json";

interface CliOptions {
  readonly file: string;
  readonly format: OutputFormat;
  readonly pairs: ReadonlyArray<readonly [number, number]>;
  readonly dump: boolean;
}

/** Streams the CLI writes to, injectable for tests. */
export interface CliIo {
  readonly stdout: LogSink;
  readonly stderr: LogSink;
}

const USAGE = "Usage: packed-apsp <graph.json> [--format text|json] [--pair <from> <to>]... [--dump]";

function parseNodeIndex(flag: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new Error(`${flag} expects two non-negative integers`);
  }
  return Number.parseInt(raw, 10);
}

function parseArgs(argv: readonly string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new Error("First positional argument must be the path to a graph descriptor");
  }
  let format: OutputFormat = "text";
  let dump = false;
  const pairs: Array<readonly [number, number]> = [];

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--pair": {
        const from = parseNodeIndex(token, rest[++i]);
        const to = parseNodeIndex(token, rest[++i]);
        pairs.push([from, to]);
        break;
      }
      case "--dump":
        dump = true;
        break;
      default:
        throw new Error(`Unknown argument '${token}'`);
    }
  }

  return { file, format, pairs, dump };
}

/** One line per pair, e.g. `a -> c: distance 2 via [b]`. */
function formatPairLine(
  graph: UndirectedGraph<DescriptorLabel>,
  result: ShortestPaths<DescriptorLabel>,
  from: number,
  to: number,
): string {
  const head = `${graph.nodeLabel(from)} -> ${graph.nodeLabel(to)}`;
  if (!result.pathExists(from, to)) {
    return `${head}: unreachable`;
  }
  return `${head}: distance ${result.distance(from, to)} via [${result.path(from, to).join(", ")}]`;
}

function renderText(
  options: CliOptions,
  graph: UndirectedGraph<DescriptorLabel>,
  result: ShortestPaths<DescriptorLabel>,
): string[] {
  const lines: string[] = [];
  if (options.pairs.length > 0) {
    for (const [from, to] of options.pairs) {
      lines.push(formatPairLine(graph, result, from, to));
    }
  } else {
    for (const entry of result.toJSON().pairs) {
      lines.push(formatPairLine(graph, result, entry.from, entry.to));
    }
  }
  if (options.dump) {
    lines.push("", result.format());
  }
  return lines;
}

function renderJson(options: CliOptions, result: ShortestPaths<DescriptorLabel>): string {
  const base =
    options.pairs.length > 0
      ? {
          nodeCount: result.nodeCount,
          pairs: options.pairs.map(([from, to]) => {
            const exists = result.pathExists(from, to);
            return { from, to, exists, distance: exists ? result.distance(from, to) : null, path: [...result.path(from, to)] };
          }),
        }
      : result.toJSON();
  const payload = options.dump ? { ...base, matrix: result.format().split("\n") } : base;
  return JSON.stringify(payload, null, 2);
}

/**
 * Runs the command line front end and resolves with the exit code. Output
 * goes to `io.stdout`; structured logs and failures go to `io.stderr`.
 */
export async function runCli(argv: readonly string[], io: CliIo = process): Promise<number> {
  const config = loadApspConfig();
  const logger = new StructuredLogger({ sink: io.stderr, minLevel: config.logLevel, logFile: config.logFile });

  try {
    if (argv.length === 0) {
      io.stdout.write(`${USAGE}\n`);
      return 1;
    }
    const options = parseArgs(argv);
    logger.info("apsp_cli_started", { file: options.file, format: options.format, pairs: options.pairs.length });

    const contents = await readFile(options.file, "utf8");
    const graph = graphFromDescriptor(parseGraphDescriptor(JSON.parse(contents)));
    const result = computeShortestPaths(graph, { logger });

    const output = options.format === "json" ? renderJson(options, result) : renderText(options, graph, result).join("\n");
    io.stdout.write(`${output}\n`);
    logger.info("apsp_cli_completed", { nodes: graph.nodeCount(), edges: graph.edgeCount() });
    return 0;
  } catch (error) {
    const normalised = normaliseApspError(error);
    logger.error("apsp_cli_failed", normalised);
    io.stderr.write(`${normalised.code}: ${normalised.message}\n`);
    return 1;
  } finally {
    await logger.flush();
  }
}

/**
 * True when `executedPath` (usually `process.argv[1]`) names this module.
 * npm installs bins as symlinks, so both sides are resolved first.
 */
function isEntryPoint(executedPath: string | undefined, moduleUrl: string): boolean {
  if (!executedPath) {
    return false;
  }
  const modulePath = fileURLToPath(moduleUrl);
  try {
    return realpathSync(executedPath) === realpathSync(modulePath);
  } catch {
    // argv[1] may name a path that no longer exists, e.g. under `node -e`.
    return executedPath === modulePath;
  }
}

const isCliEntryPoint = isEntryPoint(process.argv[1], import.meta.url);

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  formatPairLine,
  isEntryPoint,
};
