import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BenchFailed, BuildFailed, describeError, OutputParseError, RevbenchError } from './errors';
import { MeasurementStore } from './measurement-store';
import { Orchestrator, OrchestratorDependencies } from './orchestrator';
import { WorkspaceLayout } from './paths';
import { BenchmarkDescriptor, Configuration } from './types';

jest.mock('./logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    success: jest.fn(),
  },
}));

/** Replays the given values in a loop */
function sequence(values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

const silentLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
  success: jest.fn(),
};

describe('Orchestrator', () => {
  let tempDir: string;
  let layout: WorkspaceLayout;
  let store: MeasurementStore;
  let config: Configuration;
  let matmul: BenchmarkDescriptor;
  let revisions: {
    ensureMaterialized: jest.Mock<Promise<string>, [string]>;
    retainReference: jest.Mock<string, [string, string, string]>;
    resolveReference: jest.Mock<string | null, [string, string]>;
    buildRoot: (materializedPath: string) => string;
  };
  let builder: { build: jest.Mock<Promise<void>, [string]> };
  let runner: { run: jest.Mock<Promise<number>, [string, number, string]> };

  function createOrchestrator(overrides: Partial<OrchestratorDependencies> = {}): Orchestrator {
    return new Orchestrator(
      config,
      matmul,
      { revisions, builder, runner, store, random: () => 0, ...overrides },
      silentLogger
    );
  }

  function readTable(label: string): string {
    return fs.readFileSync(path.join(tempDir, 'data', 'matmul', `${label}.csv`), 'utf-8');
  }

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'revbench-run-'));
    layout = new WorkspaceLayout(tempDir, path.join(tempDir, 'repos'));
    store = new MeasurementStore(layout);
    config = {
      repository: '/repo',
      buildSubdir: 'cli',
      buildCommand: ['cargo', 'build', '--release'],
      benchCommand: ['cargo', 'run', '--release', 'bench'],
      timeoutMs: 1000,
      failurePolicy: 'abort',
      maxConsecutiveFailures: 3,
      benches: {},
    };
    matmul = {
      name: 'matmul',
      parameter: 'size',
      output: 'seconds',
      description: 'Dense matrix multiplication',
      benches: {
        old: { commit: 'abc123', benchFunction: 'matmul' },
        new: { commit: 'def456', benchFunction: 'matmul' },
      },
    };
    revisions = {
      ensureMaterialized: jest.fn(async (revision: string) => `/revs/${revision}`),
      retainReference: jest.fn(
        (benchmark: string, label: string, _revision: string) => `/work/build/${benchmark}/${label}`
      ),
      resolveReference: jest.fn((_benchmark: string, _label: string): string | null => null),
      buildRoot: (materializedPath: string) => path.join(materializedPath, 'cli'),
    };
    builder = { build: jest.fn(async (_directory: string): Promise<void> => undefined) };
    runner = {
      run: jest.fn(async (_entryPoint: string, parameter: number, _workingDirectory: string) => parameter / 1000),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('should build every revision and append one row per sample', async () => {
      // Each iteration draws the label, then the parameter
      const random = sequence([0.1, 0.0, 0.9, 0.25, 0.2, 0.5, 0.6, 0.99, 0.4, 0.7]);
      const orchestrator = createOrchestrator({ random });

      const summary = await orchestrator.run({ min: 10, max: 20, iterations: 5, build: true });

      expect(summary).toEqual({ samples: 5, perLabel: { old: 3, new: 2 }, skippedFailures: 0, aborted: false });
      expect(orchestrator.state).toBe('stopped');
      expect(readTable('old')).toBe('size,seconds\n10,0.01\n15,0.015\n17,0.017\n');
      expect(readTable('new')).toBe('size,seconds\n12,0.012\n19,0.019\n');

      expect(revisions.retainReference).toHaveBeenCalledWith('matmul', 'old', 'abc123');
      expect(revisions.retainReference).toHaveBeenCalledWith('matmul', 'new', 'def456');
      expect(builder.build.mock.calls).toEqual([['/revs/abc123/cli'], ['/revs/def456/cli']]);
      expect(runner.run).toHaveBeenNthCalledWith(1, 'matmul', 10, '/revs/abc123/cli');
      expect(runner.run).toHaveBeenNthCalledWith(2, 'matmul', 12, '/revs/def456/cli');
    });

    it('should keep every sampled parameter in [min, max)', async () => {
      const orchestrator = createOrchestrator({ random: Math.random });

      await orchestrator.run({ min: 10, max: 20, iterations: 50, build: true });

      const rows = [...readTable('old').split('\n').slice(1), ...readTable('new').split('\n').slice(1)].filter(
        line => line !== ''
      );
      expect(rows).toHaveLength(50);
      for (const row of rows) {
        const size = Number(row.split(',')[0]);
        expect(Number.isInteger(size) && size >= 10 && size < 20).toBe(true);
      }
    });

    it('should reuse an earlier build when not building', async () => {
      revisions.resolveReference.mockImplementation((_benchmark: string, label: string) => `/revs/${label}-tree`);
      const orchestrator = createOrchestrator();

      await orchestrator.run({ min: 10, max: 20, iterations: 1, build: false });

      expect(builder.build).not.toHaveBeenCalled();
      expect(revisions.ensureMaterialized).not.toHaveBeenCalled();
      expect(runner.run).toHaveBeenCalledWith('matmul', 10, '/revs/old-tree/cli');
    });

    it('should require a build when no links exist', async () => {
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, iterations: 1, build: false }).catch((e: unknown) => e);

      expect(describeError(error)).toBe(
        '[materialize] matmul/old: Revision abc123 has not been built; run "build matmul" first'
      );
      expect(orchestrator.state).toBe('failed');
      expect(runner.run).not.toHaveBeenCalled();
    });
  });

  describe('prepare', () => {
    it('should fail the run and name the label whose build failed', async () => {
      builder.build.mockImplementation(async (directory: string) => {
        if (directory.includes('def456')) {
          throw new BuildFailed(directory, 101, 'error[E0425]');
        }
      });
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, iterations: 5, build: true }).catch((e: unknown) => e);

      expect(describeError(error)).toBe('[build] matmul/new: Build failed in /revs/def456/cli (exit code 101)');
      expect(orchestrator.state).toBe('failed');
      expect(orchestrator.buildStatus('old')).toBe('built');
      expect(orchestrator.buildStatus('new')).toBe('failed');
      expect(runner.run).not.toHaveBeenCalled();
      expect(fs.existsSync(path.join(tempDir, 'data', 'matmul'))).toBe(false);
    });

    it('should wrap unexpected materialization errors with their stage', async () => {
      revisions.ensureMaterialized.mockRejectedValue(new Error('EACCES: permission denied'));
      const orchestrator = createOrchestrator();

      const error = await orchestrator.prepare().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RevbenchError);
      expect(describeError(error)).toBe('[materialize] matmul/old: EACCES: permission denied');
    });

    it('should build a revision shared by several labels once', async () => {
      matmul.benches = {
        a: { commit: 'abc123', benchFunction: 'matmul' },
        b: { commit: 'abc123', benchFunction: 'matmul_blocked' },
      };
      const orchestrator = createOrchestrator();

      await orchestrator.prepare();

      expect(builder.build).toHaveBeenCalledTimes(1);
      expect(orchestrator.buildStatus('a')).toBe('built');
      expect(orchestrator.buildStatus('b')).toBe('built');
    });

    it('should also build the extra target of an entry', async () => {
      matmul.benches = { zk: { commit: 'abc123', benchFunction: 'prove', elf: 'guest' } };
      const orchestrator = createOrchestrator();

      await orchestrator.prepare();

      expect(builder.build.mock.calls).toEqual([['/revs/abc123/cli'], ['/revs/abc123/guest']]);
    });

    it('should refuse to prepare twice', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.prepare();

      await expect(orchestrator.prepare()).rejects.toThrow('Cannot prepare while building (expected idle)');
    });
  });

  describe('sample', () => {
    it('should refuse to sample before building', async () => {
      await expect(createOrchestrator().sample({ min: 10, max: 20, iterations: 1 })).rejects.toThrow(
        'Cannot sample while idle (expected building)'
      );
    });

    it('should fail on unparsable output without appending a row', async () => {
      runner.run.mockRejectedValue(
        new OutputParseError('Benchmark matmul(10) printed no decimal number on stdout', {
          entryPoint: 'matmul',
          parameter: 10,
        })
      );
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, iterations: 5, build: true }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OutputParseError);
      expect(describeError(error)).toBe(
        '[sample] matmul/old: Benchmark matmul(10) printed no decimal number on stdout'
      );
      expect(readTable('old')).toBe('size,seconds\n');
      expect(orchestrator.state).toBe('failed');
    });

    it('should skip failed invocations under the skip policy', async () => {
      config.failurePolicy = 'skip';
      runner.run
        .mockRejectedValueOnce(new BenchFailed('Benchmark matmul(10) exited with code 1', { entryPoint: 'matmul', parameter: 10 }))
        .mockResolvedValue(0.5);
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run({ min: 10, max: 20, iterations: 2, build: true });

      expect(summary).toEqual({ samples: 2, perLabel: { old: 2, new: 0 }, skippedFailures: 1, aborted: false });
      expect(readTable('old')).toBe('size,seconds\n10,0.5\n10,0.5\n');
    });

    it('should give up after too many consecutive failures', async () => {
      config.failurePolicy = 'skip';
      runner.run.mockRejectedValue(new BenchFailed('boom', { entryPoint: 'matmul', parameter: 10 }));
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, build: true }).catch((e: unknown) => e);

      expect(describeError(error)).toBe('[sample] matmul/old: 3 benchmark invocations failed in a row, last: boom');
      expect(runner.run).toHaveBeenCalledTimes(3);
    });

    it('should not skip errors that are not benchmark failures', async () => {
      config.failurePolicy = 'skip';
      runner.run.mockRejectedValue(new Error('spawn EACCES'));
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, build: true }).catch((e: unknown) => e);

      expect(describeError(error)).toBe('[sample] matmul/old: spawn EACCES');
      expect(runner.run).toHaveBeenCalledTimes(1);
    });

    it('should stop at the next iteration boundary when aborted', async () => {
      const controller = new AbortController();
      runner.run.mockImplementation(async () => {
        if (runner.run.mock.calls.length === 2) {
          controller.abort();
        }
        return 1.5;
      });
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run({ min: 10, max: 20, build: true, signal: controller.signal });

      expect(summary).toEqual({ samples: 2, perLabel: { old: 2, new: 0 }, skippedFailures: 0, aborted: true });
      expect(readTable('old')).toBe('size,seconds\n10,1.5\n10,1.5\n');
      expect(orchestrator.state).toBe('stopped');
    });

    it('should stop cleanly when the interrupt also kills the running benchmark', async () => {
      const controller = new AbortController();
      runner.run.mockImplementation(async () => {
        if (runner.run.mock.calls.length === 3) {
          controller.abort();
          throw new BenchFailed('Benchmark matmul(10) was killed by SIGINT', { entryPoint: 'matmul', parameter: 10 });
        }
        return 1.5;
      });
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run({ min: 10, max: 20, build: true, signal: controller.signal });

      expect(summary).toEqual({ samples: 2, perLabel: { old: 2, new: 0 }, skippedFailures: 0, aborted: true });
      expect(readTable('old')).toBe('size,seconds\n10,1.5\n10,1.5\n');
      expect(orchestrator.state).toBe('stopped');
      expect(silentLogger.debug).toHaveBeenCalledWith(
        'Discarding interrupted sample for old: Benchmark matmul(10) was killed by SIGINT'
      );
    });

    it('should take no sample when aborted before starting', async () => {
      const controller = new AbortController();
      controller.abort();
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run({ min: 10, max: 20, build: true, signal: controller.signal });

      expect(summary.samples).toBe(0);
      expect(summary.aborted).toBe(true);
      expect(runner.run).not.toHaveBeenCalled();
    });

    it('should reject an empty parameter range before sampling', async () => {
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 20, max: 10, iterations: 1, build: true }).catch((e: unknown) => e);

      expect(describeError(error)).toBe(
        '[sample] matmul/old: Invalid sampling range [20, 10): min must be less than max'
      );
      expect(runner.run).not.toHaveBeenCalled();
    });

    it('should surface a schema conflict before sampling', async () => {
      fs.mkdirSync(path.join(tempDir, 'data', 'matmul'), { recursive: true });
      fs.writeFileSync(path.join(tempDir, 'data', 'matmul', 'old.csv'), 'n,ms\n');
      const orchestrator = createOrchestrator();

      const error = await orchestrator.run({ min: 10, max: 20, iterations: 1, build: true }).catch((e: unknown) => e);

      expect(error).toMatchObject({ stage: 'schema', benchmark: 'matmul', label: 'old' });
      expect(runner.run).not.toHaveBeenCalled();
    });
  });
});
