import ActiveInferenceAgent from '../src/agent';
import { NORMALIZATION_TOLERANCE } from '../src/agent/agent.constants';
import { AgentConfigError } from '../src/agent/agent.options';
import { config } from '../src/config';
import { GridWorld } from '../src/world/gridWorld';
import { nonZeroCells, sumMatrix } from './utils/test-helpers';

describe('ActiveInferenceAgent', () => {
  describe('construction', () => {
    it('starts at the configured start with a one-entry history', () => {
      // Act
      const agent = new ActiveInferenceAgent({ rows: 3, cols: 3, start: [1, 1], goal: [2, 2] });
      // Assert
      expect([agent.position, agent.history, agent.steps, agent.phase]).toEqual([
        [1, 1],
        [[1, 1]],
        0,
        'awaitingAction',
      ]);
    });
    it('starts from a normalized uniform belief', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 3, cols: 3, goal: [2, 2] });
      // Act
      const matrix = agent.beliefMatrix();
      // Assert
      expect(sumMatrix(matrix)).toBeCloseTo(1, 6);
      expect(nonZeroCells(matrix)).toHaveLength(9);
    });
    it('rejects an invalid configuration', () => {
      expect(() => new ActiveInferenceAgent({ goal: [10, 10] })).toThrow(AgentConfigError);
    });
  });

  describe('Scenario: goal one cell to the right on a 2x2 grid', () => {
    let agent: ActiveInferenceAgent;
    let world: GridWorld;
    beforeEach(() => {
      agent = new ActiveInferenceAgent({ rows: 2, cols: 2, goal: [0, 1], explorationRate: 0 });
      world = new GridWorld({ rows: 2, cols: 2 });
    });

    it('chooses right', () => {
      expect(agent.chooseAction().action).toBe('right');
    });
    it('reaches the goal in one step and collapses the belief onto it', () => {
      // Act
      const outcome = agent.step(world);
      // Assert
      expect(outcome).toMatchObject({
        step: 1,
        action: 'right',
        explored: false,
        target: [0, 1],
        observation: 'free',
        position: [0, 1],
      });
      expect(agent.checkGoal()).toBe(true);
      expect(agent.phase).toBe('goalReached');
      expect(nonZeroCells(agent.beliefMatrix())).toEqual([[0, 1]]);
      expect(agent.beliefAt([0, 1])).toBeCloseTo(1, 6);
    });
    it('records the step in telemetry and history exports', () => {
      // Act
      agent.step(world);
      const [record] = agent.telemetry();
      // Assert
      expect(record).toMatchObject({
        step: 1,
        action: 'right',
        explored: false,
        targetRow: 0,
        targetCol: 1,
        observation: 'free',
        row: 0,
        col: 1,
      });
      expect(record.bestScore).toBeCloseTo(0, 6);
      expect(record.beliefAtGoal).toBeCloseTo(1, 6);
      expect(agent.exportHistoryCSV()).toBe('step,row,col\n0,0,0\n1,0,1');
      expect(agent.exportTelemetryJSONL().split('\n')).toHaveLength(1);
    });
    it('refuses to step once the goal is reached', () => {
      // Arrange
      agent.step(world);
      // Act & Assert
      expect(() => agent.step(world)).toThrow(
        'Cannot step: the agent is already at the goal (0,1).'
      );
    });
  });

  describe('Scenario: obstacle to the right on a 3x3 grid', () => {
    let agent: ActiveInferenceAgent;
    let world: GridWorld;
    beforeEach(() => {
      agent = new ActiveInferenceAgent({
        rows: 3,
        cols: 3,
        goal: [2, 2],
        obstacles: [[0, 1]],
        explorationRate: 0,
      });
      world = new GridWorld({ rows: 3, cols: 3 }, [[0, 1]]);
    });

    it('stays put and rules the obstacle out when forced into it', () => {
      // Act
      const outcome = agent.step(world, 'right');
      // Assert
      expect([outcome.observation, outcome.position, agent.phase]).toEqual([
        'obstacle',
        [0, 0],
        'beliefsUpdated',
      ]);
      expect(agent.beliefAt([0, 1])).toBe(0);
      expect(agent.beliefSum()).toBeCloseTo(1, 6);
    });
    it('routes around the obstacle and reaches the goal', () => {
      // Act
      agent.step(world, 'right');
      while (!agent.checkGoal()) agent.step(world);
      // Assert
      expect(agent.steps).toBe(5);
      expect(agent.history).toEqual([
        [0, 0],
        [0, 0],
        [1, 0],
        [2, 0],
        [2, 1],
        [2, 2],
      ]);
      expect(agent.beliefAt([0, 1])).toBe(0);
      expect(Math.abs(agent.beliefSum() - 1)).toBeLessThan(NORMALIZATION_TOLERANCE);
    });
    it('never scores a move into the known obstacle as finite', () => {
      // Arrange
      agent.step(world, 'right');
      // Act & Assert
      expect(agent.score('right')).toBe(Infinity);
    });
  });

  describe('Scenario: move off the grid', () => {
    it('is observed as an obstacle and leaves the belief untouched', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 2, cols: 2, goal: [1, 1] });
      const before = agent.beliefMatrix();
      // Act
      const outcome = agent.step(new GridWorld({ rows: 2, cols: 2 }), 'up');
      // Assert
      expect([outcome.target, outcome.observation, outcome.position]).toEqual([
        [-1, 0],
        'obstacle',
        [0, 0],
      ]);
      expect(agent.beliefMatrix()).toEqual(before);
    });
  });

  describe('queries', () => {
    it('predicts positions without moving', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 3, cols: 3, start: [1, 1], goal: [2, 2] });
      // Act
      const predicted = agent.predictNextPosition('left');
      // Assert
      expect([predicted, agent.position]).toEqual([
        [1, 0],
        [1, 1],
      ]);
    });
    it('scores all four actions in canonical order', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 3, cols: 3, goal: [2, 2] });
      // Act
      const scores = agent.scoreAll();
      // Assert
      expect(scores.map((entry) => [entry.action, entry.admissible])).toEqual([
        ['up', false],
        ['down', true],
        ['left', false],
        ['right', true],
      ]);
    });
    it('rejects a world of different size', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 3, cols: 3, goal: [2, 2] });
      // Act & Assert
      expect(() => agent.step(new GridWorld({ rows: 2, cols: 2 }))).toThrow(
        'World is 2x2 but the agent was configured for 3x3.'
      );
    });
  });

  describe('Scenario: same seed', () => {
    it('produces identical exploratory choices', () => {
      // Arrange
      const settings = { rows: 5, cols: 5, goal: [4, 4] as const, explorationRate: 0.5, seed: 'test-seed' };
      const first = new ActiveInferenceAgent(settings);
      const second = new ActiveInferenceAgent(settings);
      // Act
      const picks = (agent: ActiveInferenceAgent) =>
        Array.from({ length: 20 }, () => {
          const decision = agent.chooseAction();
          return `${decision.action}:${decision.explored}`;
        });
      // Assert
      expect(picks(first)).toEqual(picks(second));
    });
  });

  describe('updateBelief()', () => {
    it('warns when the belief degenerates to all zeros', () => {
      // Arrange
      config.warnings = true;
      const spy = jest.spyOn(console, 'warn').mockImplementation(() => {});
      const agent = new ActiveInferenceAgent({ rows: 1, cols: 2, goal: [0, 1] });
      try {
        // Act
        agent.updateBelief('obstacle', [0, 0]);
        agent.updateBelief('obstacle', [0, 1]);
        // Assert
        expect(spy).toHaveBeenCalledWith('Belief degenerated to all zeros after observing 0,1.');
      } finally {
        spy.mockRestore();
        config.warnings = false;
      }
    });
    it('rejects a target outside the grid', () => {
      // Arrange
      const agent = new ActiveInferenceAgent({ rows: 2, cols: 2, goal: [1, 1] });
      // Act & Assert
      expect(() => agent.updateBelief('free', [2, 2])).toThrow(RangeError);
    });
  });
});
