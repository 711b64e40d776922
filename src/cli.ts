#!/usr/bin/env node
/**
 * Command-line driver.
 *
 * Usage:
 *   efe-navigator [--rows N --cols N --start r,c --goal r,c --obstacle r,c ...]
 *                 [--world FILE | --batch GLOB]
 *                 [--max-steps N] [--exploration P] [--seed S] [--stall-limit N]
 *                 [--render] [--no-color] [--warnings] [--out DIR]
 *
 * Exit codes: 0 every episode reached its goal, 1 at least one did not,
 * 2 invalid arguments, configuration or world file.
 */
import fg from 'fast-glob';
import fs from 'fs-extra';
import * as path from 'path';
import { parseArgs } from 'util';
import type ActiveInferenceAgent from './agent';
import {
  AgentConfigError,
  type AgentConfigInput,
} from './agent/agent.options';
import type { Position } from './agent/agent.types';
import { config } from './config';
import { createFrame, runEpisode, type EpisodeResult } from './runner/runner';
import { BeliefVisualization } from './visualization/beliefVisualization';
import { colors } from './visualization/colors';
import { TerminalUtility, type LineSink } from './visualization/terminalUtility';
import type { WorldDefinition } from './world/gridWorld';
import { parseWorld, WorldParseError } from './world/worldParser';

/** Raised for malformed command-line arguments. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Parsed command line. Unset fields fall back to the world file or defaults. */
export interface CliOptions {
  overrides: AgentConfigInput;
  world?: string;
  batch?: string;
  render: boolean;
  color: boolean;
  warnings: boolean;
  out?: string;
  help: boolean;
}

export const USAGE = [
  'Usage: efe-navigator [options]',
  '',
  '  --rows N            grid height (default 10)',
  '  --cols N            grid width (default 10)',
  '  --start r,c         start cell (default 0,0)',
  '  --goal r,c          goal cell (default 9,9)',
  '  --obstacle r,c      obstacle cell (repeatable)',
  '  --world FILE        load an ASCII world (S start, G goal, # obstacle)',
  '  --batch GLOB        run every world file matching GLOB',
  '  --max-steps N       step budget (default 100)',
  '  --exploration P     random-action probability in [0,1] (default 0.1)',
  '  --seed S            seed for reproducible exploration',
  '  --stall-limit N     stop after N consecutive non-advancing steps',
  '  --render            draw the belief heatmap after every step',
  '  --no-color          plain-text output',
  '  --warnings          print runtime warnings',
  '  --out DIR           write telemetry.jsonl, telemetry.csv and history.csv',
  '  --help              show this message',
].join('\n');

/** Parse `"r,c"` into a position. */
export function parsePosition(label: string, text: string): Position {
  const match = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(text);
  if (!match) {
    throw new CliUsageError(`--${label} expects "row,col" (got "${text}")`);
  }
  return [Number(match[1]), Number(match[2])];
}

function parseNumber(label: string, text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = Number(text);
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new CliUsageError(`--${label} expects a number (got "${text}")`);
  }
  return value;
}

const ARG_OPTIONS = {
  rows: { type: 'string' },
  cols: { type: 'string' },
  start: { type: 'string' },
  goal: { type: 'string' },
  obstacle: { type: 'string', multiple: true },
  world: { type: 'string' },
  batch: { type: 'string' },
  'max-steps': { type: 'string' },
  exploration: { type: 'string' },
  seed: { type: 'string' },
  'stall-limit': { type: 'string' },
  render: { type: 'boolean' },
  'no-color': { type: 'boolean' },
  warnings: { type: 'boolean' },
  out: { type: 'string' },
  help: { type: 'boolean' },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: ARG_OPTIONS,
    }).values;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliUsageError(reason);
  }
}

/**
 * Parse raw arguments (without the node/script prefix).
 *
 * @throws {CliUsageError} On unknown flags or malformed values.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = readArgs(argv);

  if (values.world !== undefined && values.batch !== undefined) {
    throw new CliUsageError('--world and --batch cannot be combined');
  }

  const overrides: AgentConfigInput = {};
  const rows = parseNumber('rows', values.rows);
  if (rows !== undefined) overrides.rows = rows;
  const cols = parseNumber('cols', values.cols);
  if (cols !== undefined) overrides.cols = cols;
  if (values.start !== undefined) overrides.start = parsePosition('start', values.start);
  if (values.goal !== undefined) overrides.goal = parsePosition('goal', values.goal);
  if (values.obstacle !== undefined) {
    overrides.obstacles = values.obstacle.map((text) => parsePosition('obstacle', text));
  }
  const maxSteps = parseNumber('max-steps', values['max-steps']);
  if (maxSteps !== undefined) overrides.maxSteps = maxSteps;
  const exploration = parseNumber('exploration', values.exploration);
  if (exploration !== undefined) overrides.explorationRate = exploration;
  if (values.seed !== undefined) overrides.seed = values.seed;
  const stallLimit = parseNumber('stall-limit', values['stall-limit']);
  if (stallLimit !== undefined) overrides.stallLimit = stallLimit;

  return {
    overrides,
    world: values.world,
    batch: values.batch,
    render: values.render ?? false,
    color: !(values['no-color'] ?? false),
    warnings: values.warnings ?? false,
    out: values.out,
    help: values.help ?? false,
  };
}

/**
 * Layer explicit command-line overrides on top of a world definition: the
 * world supplies geometry, the flags win wherever both are given.
 */
export function mergeWorld(
  world: WorldDefinition,
  overrides: AgentConfigInput
): AgentConfigInput {
  return {
    rows: world.rows,
    cols: world.cols,
    start: world.start,
    goal: world.goal,
    obstacles: world.obstacles,
    ...overrides,
  };
}

async function loadWorld(file: string): Promise<WorldDefinition> {
  return parseWorld(await fs.readFile(file, 'utf8'));
}

/** Write the run's exports into `dir` (created when missing). */
export async function writeExports(agent: ActiveInferenceAgent, dir: string): Promise<void> {
  await fs.outputFile(path.join(dir, 'telemetry.jsonl'), agent.exportTelemetryJSONL() + '\n');
  await fs.outputFile(path.join(dir, 'telemetry.csv'), agent.exportTelemetryCSV() + '\n');
  await fs.outputFile(path.join(dir, 'history.csv'), agent.exportHistoryCSV() + '\n');
}

interface RunContext {
  options: CliOptions;
  log: (...args: unknown[]) => void;
  clear: () => void;
}

function runOne(input: AgentConfigInput, context: RunContext): EpisodeResult {
  const { options, log, clear } = context;
  return runEpisode(input, {
    onStep: options.render
      ? (frame) => {
          clear();
          log(BeliefVisualization.renderFrame(frame, { color: options.color }));
        }
      : undefined,
  });
}

function paintStatus(result: EpisodeResult, color: boolean): string {
  if (!color) return result.message;
  const code = result.reached ? colors.cyanNeon : colors.neonRed;
  return `${code}${result.message}${colors.reset}`;
}

/**
 * Execute the CLI and resolve to the process exit code.
 *
 * @param sink - Output stream (default: `process.stdout`).
 */
export async function runCli(
  argv: readonly string[],
  sink: LineSink = process.stdout
): Promise<number> {
  const log = TerminalUtility.createForceLog(sink);
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    log(`error: ${error.message}`);
    log(USAGE);
    return 2;
  }
  if (options.help) {
    log(USAGE);
    return 0;
  }
  config.warnings = options.warnings;
  config.colors = options.color;
  const context: RunContext = {
    options,
    log,
    clear: options.render ? TerminalUtility.createTerminalClearer(sink) : () => {},
  };

  try {
    if (options.batch !== undefined) {
      const files = (await fg(options.batch, { absolute: true, onlyFiles: true })).sort();
      if (!files.length) {
        log(`error: no world files match "${options.batch}"`);
        return 2;
      }
      let allReached = true;
      for (const file of files) {
        const world = await loadWorld(file);
        const result = runOne(mergeWorld(world, options.overrides), context);
        if (!result.reached) allReached = false;
        log(`${path.basename(file)}: ${paintStatus(result, options.color)}`);
        if (options.out !== undefined) {
          const name = path.basename(file, path.extname(file));
          await writeExports(result.agent, path.join(options.out, name));
        }
      }
      return allReached ? 0 : 1;
    }

    const input =
      options.world !== undefined
        ? mergeWorld(await loadWorld(options.world), options.overrides)
        : options.overrides;
    const result = runOne(input, context);
    if (!options.render) {
      log(
        BeliefVisualization.renderHeatmap(createFrame(result.agent, result.world), {
          color: options.color,
        })
      );
    }
    log(paintStatus(result, options.color));
    if (options.out !== undefined) await writeExports(result.agent, options.out);
    return result.reached ? 0 : 1;
  } catch (error) {
    if (error instanceof AgentConfigError || error instanceof WorldParseError) {
      log(`error: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = 2;
    });
}
