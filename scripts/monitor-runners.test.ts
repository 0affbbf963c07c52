import type { TaskStatus, TaskSummary } from '../src/fleet/ecs';
import { monitorRunners } from './monitor-runners';

const task = (taskId: string, lastStatus: string, createdAt: string, trigger: string | null = null): TaskSummary => ({
  taskId,
  lastStatus,
  createdAt: new Date(createdAt),
  stoppedAt: null,
  stoppedReason: null,
  trigger,
});

const stubFleet = (tasks: Record<TaskStatus, TaskSummary[]>) => ({
  describe: jest.fn(async (status: TaskStatus) => tasks[status]),
});

describe('monitorRunners', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const printed = (): string[] => log.mock.calls.map((call) => String(call[0]));

  it('lists stopped tasks newest first, at most ten', async () => {
    const stopped = Array.from({ length: 12 }, (_, i) =>
      task(`s${i}`, 'STOPPED', `2024-05-01T10:${String(i).padStart(2, '0')}:00Z`, 'push-push-main')
    );
    const fleet = stubFleet({ RUNNING: [], PENDING: [], STOPPED: stopped });

    await expect(monitorRunners(fleet)).resolves.toBe(0);

    expect(fleet.describe).toHaveBeenCalledWith('STOPPED', 10);
    const stoppedLines = printed().filter((line) => line.startsWith('  s'));
    expect(stoppedLines).toHaveLength(10);
    expect(stoppedLines[0]).toBe('  s11 | STOPPED | created 2024-05-01T10:11:00.000Z | trigger push-push-main');
    expect(stoppedLines[9].startsWith('  s2 |')).toBe(true);
    expect(printed()).toContain('Summary: 0 running, 0 pending, 0 active');
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns when more than one runner is active', async () => {
    const fleet = stubFleet({
      RUNNING: [task('r1', 'RUNNING', '2024-05-01T10:00:00Z', 'workflow_job-job-build')],
      PENDING: [task('p1', 'PENDING', '2024-05-01T10:01:00Z')],
      STOPPED: [],
    });

    await expect(monitorRunners(fleet)).resolves.toBe(2);

    expect(printed()).toContain('  r1 | RUNNING | created 2024-05-01T10:00:00.000Z | trigger workflow_job-job-build');
    expect(printed()).toContain('  p1 | PENDING | created 2024-05-01T10:01:00.000Z | trigger n/a');
    expect(printed()).toContain('Summary: 1 running, 1 pending, 2 active');
    expect(warn).toHaveBeenCalledWith('Warning: 2 runners active; duplicate provisioning is possible');
  });

  it('stays quiet with a single active runner', async () => {
    const fleet = stubFleet({ RUNNING: [task('r1', 'RUNNING', '2024-05-01T10:00:00Z')], PENDING: [], STOPPED: [] });
    await expect(monitorRunners(fleet)).resolves.toBe(1);
    expect(printed()).toContain('Last 10 stopped (0)');
    expect(warn).not.toHaveBeenCalled();
  });
});
