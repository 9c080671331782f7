import { performance } from 'perf_hooks';
import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../../src/data/graph-builder';
import { Heuristic, zeroHeuristic } from '../../src/data/heuristic';
import { Searcher } from '../../src/data/searcher';
import { StopRecord, TransferRecord, TripSegmentRecord } from '../../src/models/ScheduleRecords';

function stops(...ids: string[]): StopRecord[] {
  return ids.map(id => ({ stop_id: id, stop_name: id, stop_lat: null, stop_lon: null }));
}

function travel(from: string, to: string, weight: number): TripSegmentRecord {
  return { from_stop_id: from, to_stop_id: to, weight, route_id: 'R1' };
}

function transfer(from: string, to: string, minTransferTime: number): TransferRecord {
  return { from_stop_id: from, to_stop_id: to, min_transfer_time: minTransferTime };
}

describe('Searcher', () => {
  describe('findPath', () => {
    it('follows travel edges to the destination', () => {
      const graph = GraphBuilder.build(stops('A', 'B', 'C'), [travel('A', 'B', 100), travel('B', 'C', 200)], []);
      const result = Searcher.findPath(graph, 'A', 'C');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.route.path).toEqual(['A', 'B', 'C']);
      expect(result.route.totalSeconds).toBe(300);
      expect(result.route.sections.map(section => section.weight)).toEqual([100, 200]);
    });

    it('uses the transfer edge which replaced a travel edge', () => {
      const graph = GraphBuilder.build(
        stops('A', 'B', 'C'),
        [travel('A', 'B', 100), travel('B', 'C', 200)],
        [transfer('A', 'B', 50)],
      );
      const result = Searcher.findPath(graph, 'A', 'C');
      expect(result.success && result.route.totalSeconds).toBe(250);
      expect(result.success && result.route.sections[0].type).toBe('transfer');
    });

    it('reports NoPathFound for disconnected stations', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [], []);
      const result = Searcher.findPath(graph, 'A', 'B');
      expect(result).toMatchObject({ success: false, error: { type: 'NoPathFound', origin: 'A', destination: 'B' } });
    });

    it('does not follow edges against their direction', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [travel('B', 'A', 10)], []);
      const result = Searcher.findPath(graph, 'A', 'B');
      expect(result.success).toBe(false);
    });

    it('reports NodeNotFound for an unknown origin before searching', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [travel('A', 'B', 10)], []);
      const result = Searcher.findPath(graph, 'X', 'A');
      expect(result).toMatchObject({ success: false, error: { type: 'NodeNotFound', stationId: 'X' } });
      expect(result.success === false && result.statistics.expandedNodes).toBe(0);
    });

    it('reports NodeNotFound for an unknown destination', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [travel('A', 'B', 10)], []);
      const result = Searcher.findPath(graph, 'A', 'Y');
      expect(result).toMatchObject({ success: false, error: { type: 'NodeNotFound', stationId: 'Y' } });
    });

    it('returns a single station route if origin and destination are equal', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [travel('A', 'B', 10), travel('B', 'A', 10)], []);
      const result = Searcher.findPath(graph, 'A', 'A');
      expect(result.success && result.route).toMatchObject({ path: ['A'], totalSeconds: 0, sections: [] });
    });

    it('prefers the cheaper of two routes', () => {
      const graph = GraphBuilder.build(
        stops('A', 'B', 'C', 'D'),
        [travel('A', 'B', 10), travel('B', 'D', 100), travel('A', 'C', 30), travel('C', 'D', 20)],
        [],
      );
      const result = Searcher.findPath(graph, 'A', 'D');
      expect(result.success && result.route.path).toEqual(['A', 'C', 'D']);
      expect(result.success && result.route.totalSeconds).toBe(50);
    });

    it('breaks ties by insertion order', () => {
      const viaB = GraphBuilder.build(
        stops('A', 'B', 'C', 'D'),
        [travel('A', 'B', 10), travel('A', 'C', 10), travel('B', 'D', 10), travel('C', 'D', 10)],
        [],
      );
      const viaC = GraphBuilder.build(
        stops('A', 'B', 'C', 'D'),
        [travel('A', 'C', 10), travel('A', 'B', 10), travel('B', 'D', 10), travel('C', 'D', 10)],
        [],
      );
      const first = Searcher.findPath(viaB, 'A', 'D', { heuristic: zeroHeuristic });
      const second = Searcher.findPath(viaC, 'A', 'D', { heuristic: zeroHeuristic });
      expect(first.success && first.route.path).toEqual(['A', 'B', 'D']);
      expect(second.success && second.route.path).toEqual(['A', 'C', 'D']);
    });

    it('terminates on zero weight cycles', () => {
      const graph = GraphBuilder.build(stops('A', 'B', 'C'), [travel('A', 'B', 0), travel('B', 'A', 0)], []);
      const result = Searcher.findPath(graph, 'A', 'C');
      expect(result.success).toBe(false);
    });

    it('stops with SearchTimeout once the time budget is used up', () => {
      const graph = GraphBuilder.build(stops('A', 'B'), [travel('A', 'B', 10)], []);
      // spends more than the budget before the first frontier entry is taken
      const slowHeuristic: Heuristic = () => {
        const start = performance.now();
        while (performance.now() - start < 5) {
          // wait
        }
        return 0;
      };
      const result = Searcher.findPath(graph, 'A', 'B', { heuristic: slowHeuristic, timeoutMs: 1 });
      expect(result).toMatchObject({ success: false, error: { type: 'SearchTimeout', timeoutMs: 1 } });
    });
  });

  describe('search state', () => {
    it('exposes costs, predecessors and finalized stations of the last search', () => {
      const graph = GraphBuilder.build(
        stops('A', 'B', 'C', 'D'),
        [travel('A', 'B', 100), travel('B', 'C', 200), travel('A', 'D', 500)],
        [],
      );
      const searcher = new Searcher(graph, zeroHeuristic);
      const result = searcher.search('A', 'C');
      expect(result.success && result.route.statistics.expandedNodes).toBe(2);
      expect(searcher.isFinalized('A')).toBe(true);
      expect(searcher.isFinalized('B')).toBe(true);
      expect(searcher.isFinalized('C')).toBe(false);
      expect(searcher.getBestCost('C')).toBe(300);
      expect(searcher.getBestCost('D')).toBe(500);
      expect(searcher.getPredecessor('C')).toBe('B');
      expect(searcher.getPredecessor('A')).toBeUndefined();
      // D is still waiting
      expect(searcher.getFrontierSize()).toBe(1);
    });

    it('resets the state for every search', () => {
      const graph = GraphBuilder.build(stops('A', 'B', 'C'), [travel('A', 'B', 100), travel('B', 'C', 200)], []);
      const searcher = new Searcher(graph, zeroHeuristic);
      searcher.search('A', 'C');
      searcher.search('B', 'C');
      expect(searcher.isFinalized('A')).toBe(false);
      expect(searcher.getBestCost('C')).toBe(200);
    });
  });
});
