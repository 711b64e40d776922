/**
 * Episode driver: runs the perception–action loop until the agent reaches the
 * goal, spends its step budget, or (optionally) stalls.
 *
 * The goal check happens at the top of every cycle, before any action is
 * chosen, so `maxSteps = 0` ends the episode without a single choice and an
 * agent that starts on its goal succeeds in 0 steps.
 */
import ActiveInferenceAgent from '../agent';
import { formatPosition, type AgentConfigInput } from '../agent/agent.options';
import type { StepRecord } from '../agent/agent.telemetry';
import type { Position, StepOutcome } from '../agent/agent.types';
import type { VisualizationFrame } from '../visualization/beliefVisualization';
import { GridWorld } from '../world/gridWorld';

export type EpisodeStatus = 'reached' | 'notReached' | 'stalled';

export interface EpisodeOptions {
  /** World to run in; defaults to one built from the agent configuration. */
  world?: GridWorld;
  /** Observer called after every committed step. Must not mutate the frame. */
  onStep?: (frame: VisualizationFrame, outcome: StepOutcome) => void;
}

export interface EpisodeResult {
  status: EpisodeStatus;
  reached: boolean;
  /** Committed steps. */
  steps: number;
  /** Human-readable termination message. */
  message: string;
  position: Position;
  history: Position[];
  telemetry: StepRecord[];
  /** The agent after the run (belief and exports stay available). */
  agent: ActiveInferenceAgent;
  world: GridWorld;
}

/** Snapshot of the agent for renderers and step observers. */
export function createFrame(
  agent: ActiveInferenceAgent,
  world: GridWorld
): VisualizationFrame {
  return {
    step: agent.steps,
    belief: agent.beliefMatrix(),
    history: agent.history,
    position: agent.position,
    goal: agent.goal,
    obstacles: world.obstacles(),
  };
}

/** Termination message for `status`. */
export function describeOutcome(
  status: EpisodeStatus,
  steps: number,
  maxSteps: number,
  position: Position
): string {
  if (status === 'reached') return `goal reached in ${steps} steps`;
  if (status === 'stalled') {
    return `stalled at ${formatPosition(position)} after ${steps} steps`;
  }
  return `goal not reached within ${maxSteps} steps`;
}

/**
 * Run one episode.
 *
 * @param configInput - Agent configuration overrides (validated by the agent).
 * @throws {AgentConfigError} When the configuration is invalid.
 */
export function runEpisode(
  configInput: AgentConfigInput = {},
  options: EpisodeOptions = {}
): EpisodeResult {
  const agent = new ActiveInferenceAgent(configInput);
  const { maxSteps, stallLimit, obstacles } = agent.config;
  const world = options.world ?? new GridWorld(agent.config, obstacles);

  let status: EpisodeStatus = 'notReached';
  let idleSteps = 0;
  for (;;) {
    if (agent.checkGoal()) {
      status = 'reached';
      break;
    }
    if (agent.steps >= maxSteps) break;

    const before = agent.position;
    const outcome = agent.step(world);
    options.onStep?.(createFrame(agent, world), outcome);

    const advanced =
      outcome.position[0] !== before[0] || outcome.position[1] !== before[1];
    idleSteps = advanced ? 0 : idleSteps + 1;
    if (stallLimit !== undefined && idleSteps >= stallLimit) {
      status = 'stalled';
      break;
    }
  }

  return {
    status,
    reached: status === 'reached',
    steps: agent.steps,
    message: describeOutcome(status, agent.steps, maxSteps, agent.position),
    position: agent.position,
    history: agent.history,
    telemetry: agent.telemetry(),
    agent,
    world,
  };
}
