/**
 * efe-navigator - Main export file
 *
 * Re-exports the agent, its collaborators (grid world, driver, renderers) and
 * the shared types so consumers can import everything from one place.
 */
import ActiveInferenceAgent from './agent';

export { ActiveInferenceAgent };
export default ActiveInferenceAgent;

export { config } from './config';
export type { NavigatorConfig } from './config';

export { BeliefStore } from './agent/agent.belief';
export { PolicyEvaluator } from './agent/agent.policy';
export type { PolicyContext } from './agent/agent.policy';
export {
  AgentConfigError,
  DEFAULT_AGENT_CONFIG,
  collectConfigIssues,
  resolveAgentConfig,
  validateAgentConfig,
} from './agent/agent.options';
export type { AgentConfigInput } from './agent/agent.options';
export * from './agent/agent.constants';
export * from './agent/agent.types';
export {
  exportHistoryCSV,
  exportTelemetryCSV,
  exportTelemetryJSONL,
} from './agent/agent.telemetry';
export type { StepRecord } from './agent/agent.telemetry';
export { default as Divergence } from './methods/divergence';

export { GridWorld } from './world/gridWorld';
export type { WorldDefinition } from './world/gridWorld';
export { parseWorld, formatWorld, WorldParseError } from './world/worldParser';

export { runEpisode, createFrame, describeOutcome } from './runner/runner';
export type { EpisodeOptions, EpisodeResult, EpisodeStatus } from './runner/runner';

export { BeliefVisualization, SHADES } from './visualization/beliefVisualization';
export type { RenderOptions, VisualizationFrame } from './visualization/beliefVisualization';
export { TerminalUtility } from './visualization/terminalUtility';
export { colors } from './visualization/colors';
