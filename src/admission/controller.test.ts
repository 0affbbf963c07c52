import type { JobQueueDepth, RepositoryCoordinates, RunnerToken } from '../github/types';
import nock from 'nock';
import { RemoteCallError } from '../errors';
import { GithubClient } from '../github/client';
import { FakeClock, FakeCredentials, FakeFleet } from '../testing/fakes';
import { AdmissionController, AdmissionRequest, RunnerQueue } from './controller';
import { InMemoryCooldownLedger } from './cooldownLedger';

class FakeRunnerQueue implements RunnerQueue {
  queue: JobQueueDepth = { queued: 0, inProgress: 0, total: 0 };
  queueError: Error | null = null;
  probeError: Error | null = null;
  readonly queueChecks: number[] = [];
  readonly probes: RepositoryCoordinates[] = [];

  async getRunQueueDepth(_ctx: unknown, _token: string, _target: RepositoryCoordinates, runId: number): Promise<JobQueueDepth> {
    this.queueChecks.push(runId);
    if (this.queueError) {
      throw this.queueError;
    }
    return this.queue;
  }

  async createRunnerRegistrationToken(_ctx: unknown, _token: string, target: RepositoryCoordinates): Promise<RunnerToken> {
    this.probes.push(target);
    if (this.probeError) {
      throw this.probeError;
    }
    return { token: 'test-registration-token', expires_at: '2030-01-01T00:00:00Z' };
  }
}

const target = { owner: 'acme', name: 'widgets' };
const GITHUB = 'https://api.github.test';

const pushRequest = (repositoryId = 1): AdmissionRequest => ({
  repositoryId,
  target,
  eventType: 'push',
  action: null,
  runId: null,
  trigger: 'push-push-main',
});

const jobRequest = (repositoryId = 1, runId: number | null = 99): AdmissionRequest => ({
  repositoryId,
  target,
  eventType: 'workflow_job',
  action: 'queued',
  runId,
  trigger: 'workflow_job-job-build',
});

const setup = () => {
  const clock = new FakeClock();
  const fleet = new FakeFleet();
  const credentials = new FakeCredentials();
  const github = new FakeRunnerQueue();
  const ledger = new InMemoryCooldownLedger(60_000, clock);
  const controller = new AdmissionController({
    ledger,
    fleet,
    credentials,
    github,
    policy: { cooldownMs: 15_000, maxOccupancy: 2 },
    clock,
  });
  return { clock, fleet, credentials, github, ledger, controller };
};

describe('AdmissionController', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('accepts with the resolved credential and commits to the ledger', async () => {
    const { controller, ledger, clock, github } = setup();
    const decision = await controller.admit(pushRequest());
    expect(decision).toEqual({
      outcome: 'accept',
      credential: { token: 'test-token', source: 'static', accountLogin: 'acme', installationId: null, expiresAt: null },
      trigger: 'push-push-main',
      occupancy: 0,
      queue: null,
    });
    expect(ledger.lastAccepted(1)).toBe(clock.now());
    expect(github.probes).toEqual([target]);
  });

  it('rejects inside the cooldown regardless of event type', async () => {
    const { controller, clock } = setup();
    expect((await controller.admit(pushRequest())).outcome).toBe('accept');

    clock.advance(5_000);
    expect(await controller.admit(jobRequest())).toEqual({
      outcome: 'reject',
      reason: 'cooldown-active',
      detail: 'Recent task created 5.0s ago',
      occupancy: null,
    });

    clock.advance(10_000);
    expect((await controller.admit(pushRequest())).outcome).toBe('accept');
  });

  it('keeps cooldowns per repository', async () => {
    const { controller } = setup();
    expect((await controller.admit(pushRequest(1))).outcome).toBe('accept');
    expect((await controller.admit(pushRequest(2))).outcome).toBe('accept');
  });

  it('lets only one of two concurrent deliveries for a repository through', async () => {
    const { controller, fleet } = setup();
    const decisions = await Promise.all([controller.admit(pushRequest()), controller.admit(pushRequest())]);
    expect(decisions.map((decision) => decision.outcome).sort()).toEqual(['accept', 'reject']);
    const rejected = decisions.find((decision) => decision.outcome === 'reject');
    expect(rejected).toMatchObject({ reason: 'cooldown-active' });
    expect(fleet.launched).toEqual([]);
  });

  describe('occupancy', () => {
    it('rejects non-job events at the ceiling', async () => {
      const { controller, fleet, github } = setup();
      fleet.running = 1;
      fleet.pending = 1;
      expect(await controller.admit(pushRequest())).toEqual({
        outcome: 'reject',
        reason: 'capacity-saturated',
        detail: 'Too many active tasks (2)',
        occupancy: 2,
      });
      expect(github.probes).toEqual([]);
    });

    it('lets a queued job past the ceiling when the queue outgrows the fleet', async () => {
      const { controller, fleet, github } = setup();
      fleet.running = 2;
      github.queue = { queued: 3, inProgress: 2, total: 5 };
      const decision = await controller.admit(jobRequest());
      expect(decision).toMatchObject({ outcome: 'accept', occupancy: 2, queue: { queued: 3, inProgress: 2, total: 5 } });
      expect(github.queueChecks).toEqual([99]);
    });

    it('treats an unavailable fleet as saturated', async () => {
      const { controller, fleet } = setup();
      fleet.occupancyError = new RemoteCallError('ecs', 'list running tasks', 'timeout', { timedOut: true });
      expect(await controller.admit(pushRequest())).toEqual({
        outcome: 'reject',
        reason: 'capacity-saturated',
        detail: 'Fleet occupancy unavailable',
        occupancy: null,
      });
    });
  });

  describe('queue depth', () => {
    it('rejects when active runners cover the queued jobs', async () => {
      const { controller, fleet, github, ledger } = setup();
      fleet.running = 1;
      github.queue = { queued: 1, inProgress: 0, total: 1 };
      expect(await controller.admit(jobRequest())).toEqual({
        outcome: 'reject',
        reason: 'sufficient-runners',
        detail: 'Sufficient runners (1) for queued jobs (1)',
        occupancy: 1,
      });
      expect(ledger.size()).toBe(0);
    });

    it('skips the queue check on an empty fleet even when the queue is unreadable', async () => {
      const { controller, github } = setup();
      github.queue = { queued: 3, inProgress: 0, total: 3 };
      github.queueError = new RemoteCallError('github', 'list workflow run jobs', 'socket hang up');
      expect(await controller.admit(jobRequest())).toMatchObject({ outcome: 'accept', occupancy: 0, queue: null });
      expect(github.queueChecks).toEqual([]);
    });

    it('rejects when the GitHub jobs listing times out while runners are active', async () => {
      const clock = new FakeClock();
      const fleet = new FakeFleet();
      fleet.running = 1;
      const controller = new AdmissionController({
        ledger: new InMemoryCooldownLedger(60_000, clock),
        fleet,
        credentials: new FakeCredentials(),
        github: new GithubClient({ baseUrl: GITHUB, timeout: 100 }),
        policy: { cooldownMs: 15_000, maxOccupancy: 2 },
        clock,
      });
      nock(GITHUB)
        .get('/repos/acme/widgets/actions/runs/99/jobs')
        .query({ per_page: '100' })
        .delay(500)
        .reply(200, { jobs: [{ id: 1, run_id: 99, name: 'build', status: 'queued' }] });

      expect(await controller.admit(jobRequest())).toEqual({
        outcome: 'reject',
        reason: 'queue-check-failed',
        detail: 'Active runners present (1), queue unknown',
        occupancy: 1,
      });
    });

    it('rejects when the queue cannot be read while runners are active', async () => {
      const { controller, fleet, github } = setup();
      fleet.running = 1;
      github.queueError = new RemoteCallError('github', 'list workflow run jobs', 'Request failed with status code 502', { status: 502 });
      expect(await controller.admit(jobRequest())).toEqual({
        outcome: 'reject',
        reason: 'queue-check-failed',
        detail: 'Active runners present (1), queue unknown',
        occupancy: 1,
      });
    });

    it('rejects a job without a run id while runners are active', async () => {
      const { controller, fleet, github } = setup();
      fleet.running = 1;
      expect(await controller.admit(jobRequest(1, null))).toMatchObject({ outcome: 'reject', reason: 'queue-check-failed' });
      expect(github.queueChecks).toEqual([]);
    });

    it('resolves the credential once for queue check and probe', async () => {
      const { controller, fleet, github, credentials } = setup();
      fleet.running = 1;
      github.queue = { queued: 2, inProgress: 1, total: 3 };
      expect((await controller.admit(jobRequest())).outcome).toBe('accept');
      expect(credentials.resolved).toEqual(['acme']);
    });
  });

  describe('credential and probe', () => {
    it('rejects without a credential source', async () => {
      const { controller, credentials, ledger } = setup();
      credentials.token = null;
      expect(await controller.admit(pushRequest())).toEqual({
        outcome: 'reject',
        reason: 'no-credential',
        detail: 'No credential available for acme',
        occupancy: 0,
      });
      expect(ledger.size()).toBe(0);
    });

    it('rejects when the credential cannot register runners', async () => {
      const { controller, github, ledger } = setup();
      github.probeError = new RemoteCallError('github', 'create runner registration token', 'Request failed with status code 403', {
        status: 403,
      });
      expect(await controller.admit(pushRequest())).toEqual({
        outcome: 'reject',
        reason: 'insufficient-permissions',
        detail: 'Runner registration probe failed: github create runner registration token failed: Request failed with status code 403',
        occupancy: 0,
      });
      expect(ledger.size()).toBe(0);
    });
  });
});
