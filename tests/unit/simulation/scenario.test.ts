import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SchedulerError } from '../../../src/api/errors.js';
import { defaultScenarioPath, loadScenario, parseScenario } from '../../../src/simulation/scenario.js';
import { catchError } from '../../helpers/fixtures.js';

describe('Scenario loading', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'mlfq-scenario-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parseScenario', () => {
    it('should fill in defaults and convert process fields', () => {
      const scenario = parseScenario({ processes: [{ id: 'a', remaining_time: 4 }] });

      expect(scenario).toEqual({
        processes: [{ id: 'a', priority: 0, remainingTime: 4, totalExecutedTime: 0 }],
        strategy: 'drain',
      });
    });

    it('should keep scheduler overrides as given', () => {
      const scenario = parseScenario({
        name: 'overrides',
        scheduler: { num_levels: 2, time_quanta: [1, 3] },
        processes: [],
        final_elapsed: 0,
      });

      expect(scenario.scheduler).toEqual({ num_levels: 2, time_quanta: [1, 3] });
      expect(scenario.final_elapsed).toBe(0);
    });

    it('should name the first invalid field', () => {
      const error = catchError(() =>
        parseScenario({ processes: [{ id: 1, remaining_time: -1 }] })
      );

      expect(error).toBeInstanceOf(SchedulerError);
      expect(error).toMatchObject({
        code: 'ScenarioError',
        message: "Validation error on field 'processes.0.remaining_time': Must be non-negative",
      });
    });

    it('should reject an unknown strategy', () => {
      const error = catchError(() => parseScenario({ processes: [], strategy: 'round-robin' }));

      expect(error).toMatchObject({ code: 'ScenarioError' });
    });
  });

  describe('loadScenario', () => {
    it('should load the bundled default scenario', () => {
      const scenario = loadScenario(defaultScenarioPath());

      expect(scenario.name).toBe('default');
      expect(scenario.processes.map((process) => [process.id, process.priority, process.remainingTime])).toEqual([
        [1, 0, 10],
        [2, 0, 3],
        [3, 1, 5],
      ]);
      expect(scenario.final_elapsed).toBe(100);
    });

    it('should read a scenario file', () => {
      const path = join(tempDir, 'scenario.yaml');
      writeFileSync(path, 'strategy: highest-first\nprocesses:\n  - id: x\n    priority: 4\n    remaining_time: 2\n');

      const scenario = loadScenario(path);

      expect(scenario.strategy).toBe('highest-first');
      expect(scenario.processes).toEqual([{ id: 'x', priority: 4, remainingTime: 2, totalExecutedTime: 0 }]);
    });

    it('should report a missing file as a scenario error', () => {
      const path = join(tempDir, 'missing.yaml');

      const error = catchError(() => loadScenario(path));

      expect(error).toMatchObject({ code: 'ScenarioError', details: { path } });
    });

    it('should report malformed YAML as a scenario error', () => {
      const path = join(tempDir, 'broken.yaml');
      writeFileSync(path, 'processes: [\n');

      expect(catchError(() => loadScenario(path))).toMatchObject({ code: 'ScenarioError' });
    });
  });
});
