import { GridWorld } from '../../src/world/gridWorld';

describe('GridWorld', () => {
  describe('construction', () => {
    it('marks obstacles in the occupancy matrix', () => {
      // Act
      const world = new GridWorld({ rows: 2, cols: 3 }, [[0, 1]]);
      // Assert
      expect(world.toMatrix()).toEqual([
        [0, 1, 0],
        [0, 0, 0],
      ]);
    });
    it('rejects non-positive dimensions', () => {
      expect(() => new GridWorld({ rows: 0, cols: 3 })).toThrow(
        'Grid dimensions must be positive integers (got 0x3).'
      );
    });
    it('rejects an obstacle outside the grid', () => {
      expect(() => new GridWorld({ rows: 2, cols: 2 }, [[2, 0]])).toThrow(
        'Obstacle (2,0) outside the 2x2 grid.'
      );
    });
    it('builds from a world definition', () => {
      // Act
      const world = GridWorld.fromDefinition({
        rows: 3,
        cols: 3,
        start: [0, 0],
        goal: [2, 2],
        obstacles: [
          [1, 1],
          [0, 2],
        ],
      });
      // Assert
      expect(world.obstacles()).toEqual([
        [0, 2],
        [1, 1],
      ]);
    });
  });

  describe('occupancy()', () => {
    const world = new GridWorld({ rows: 2, cols: 2 }, [[1, 1]]);

    it.each([
      [[0, 0], 'free'],
      [[1, 1], 'obstacle'],
      [[-1, 0], 'obstacle'],
      [[0, 2], 'obstacle'],
    ] as const)('reports %j as %s', (position, expected) => {
      expect(world.occupancy(position)).toBe(expected);
    });
  });

  describe('inBounds()', () => {
    it('distinguishes edge cells from cells beyond the edge', () => {
      // Arrange
      const world = new GridWorld({ rows: 2, cols: 2 });
      // Act & Assert
      expect([world.inBounds([1, 1]), world.inBounds([1, 2])]).toEqual([true, false]);
    });
  });
});
