import type { Credential, CredentialProvider } from '../credentials/resolver';
import { NoCredentialError, errorMessage } from '../errors';
import type { FleetMonitor } from '../fleet/ecs';
import type { JobQueueDepth, RepositoryCoordinates, RunnerToken } from '../github/types';
import { Clock, systemClock } from '../lib/clock';
import { logger, LogContext } from '../logger';
import type { CooldownLedger } from './cooldownLedger';
import { KeyedLock } from './keyedLock';

export type RejectionReason =
  | 'cooldown-active'
  | 'capacity-saturated'
  | 'sufficient-runners'
  | 'queue-check-failed'
  | 'insufficient-permissions'
  | 'no-credential';

export interface AdmissionRequest {
  repositoryId: number;
  target: RepositoryCoordinates;
  eventType: string;
  action: string | null;
  // workflow run the queued job belongs to (workflow_job only)
  runId: number | null;
  trigger: string;
}

export type AdmissionDecision =
  | {
      outcome: 'accept';
      credential: Credential;
      trigger: string;
      occupancy: number;
      queue: JobQueueDepth | null;
    }
  | {
      outcome: 'reject';
      reason: RejectionReason;
      detail: string;
      occupancy: number | null;
    };

// GitHub calls admission depends on; GithubClient satisfies it
export interface RunnerQueue {
  getRunQueueDepth(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates, runId: number): Promise<JobQueueDepth>;
  createRunnerRegistrationToken(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates): Promise<RunnerToken>;
}

export interface AdmissionPolicy {
  cooldownMs: number;
  // occupancy at which only workflow_job may still pass
  maxOccupancy: number;
}

export interface AdmissionControllerOptions {
  ledger: CooldownLedger;
  fleet: FleetMonitor;
  credentials: CredentialProvider;
  github: RunnerQueue;
  policy: AdmissionPolicy;
  clock?: Clock;
}

const reject = (reason: RejectionReason, detail: string, occupancy: number | null): AdmissionDecision => ({
  outcome: 'reject',
  reason,
  detail,
  occupancy,
});

/**
 * Best-effort admission over two racy remote views (fleet and GitHub queue) without a
 * distributed lock. Per repository the whole decision runs under a local lock and the
 * ledger write is the commit point, so two concurrent deliveries for the same
 * repository cannot both pass the cooldown. Across repositories, and between the
 * occupancy read and the launch, a few extra tasks are possible; runners are
 * disposable and stop themselves when idle.
 *
 * The only side effect is the ledger commit; launching is the caller's job.
 */
export class AdmissionController {
  private readonly lock = new KeyedLock<number>();
  private readonly clock: Clock;

  constructor(private readonly options: AdmissionControllerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async admit(request: AdmissionRequest, ctx?: LogContext): Promise<AdmissionDecision> {
    const decision = await this.lock.run(request.repositoryId, () => this.decide(request, ctx));
    if (decision.outcome === 'reject') {
      logger.info(ctx, 'Admission rejected', {
        repositoryId: request.repositoryId,
        eventType: request.eventType,
        action: request.action,
        reason: decision.reason,
        detail: decision.detail,
        occupancy: decision.occupancy,
      });
    } else {
      logger.info(ctx, 'Admission accepted', {
        repositoryId: request.repositoryId,
        eventType: request.eventType,
        trigger: decision.trigger,
        occupancy: decision.occupancy,
        credentialSource: decision.credential.source,
      });
    }
    return decision;
  }

  private async decide(request: AdmissionRequest, ctx?: LogContext): Promise<AdmissionDecision> {
    const { ledger, fleet, credentials, github, policy } = this.options;
    const { repositoryId, target } = request;

    const startedAt = this.clock.now();
    const last = ledger.lastAccepted(repositoryId);
    if (last !== undefined && startedAt - last < policy.cooldownMs) {
      const ago = ((startedAt - last) / 1000).toFixed(1);
      return reject('cooldown-active', `Recent task created ${ago}s ago`, null);
    }

    let occupancy: number;
    try {
      occupancy = (await fleet.occupancy(ctx)).total;
    } catch (error: unknown) {
      // Unknown fleet size is treated as full
      logger.error(ctx, 'Fleet occupancy query failed', { error: errorMessage(error) });
      return reject('capacity-saturated', 'Fleet occupancy unavailable', null);
    }

    const isJob = request.eventType === 'workflow_job';
    if (occupancy >= policy.maxOccupancy) {
      if (!isJob) {
        return reject('capacity-saturated', `Too many active tasks (${occupancy})`, occupancy);
      }
      logger.warn(ctx, 'Allowing workflow_job despite saturation', { occupancy });
    }

    let credential: Credential | null = null;
    let queue: JobQueueDepth | null = null;

    if (occupancy > 0 && isJob) {
      try {
        credential = await credentials.resolve(target.owner, ctx);
        if (request.runId === null) {
          throw new Error('workflow_job payload carries no run id');
        }
        queue = await github.getRunQueueDepth(ctx, credential.token, target, request.runId);
      } catch (error: unknown) {
        if (error instanceof NoCredentialError) {
          return reject('no-credential', error.message, occupancy);
        }
        logger.warn(ctx, 'Could not check job queue', { error: errorMessage(error), occupancy });
        return reject('queue-check-failed', `Active runners present (${occupancy}), queue unknown`, occupancy);
      }
      if (occupancy >= queue.queued) {
        return reject('sufficient-runners', `Sufficient runners (${occupancy}) for queued jobs (${queue.queued})`, occupancy);
      }
    }

    if (!credential) {
      try {
        credential = await credentials.resolve(target.owner, ctx);
      } catch (error: unknown) {
        return reject('no-credential', errorMessage(error), occupancy);
      }
    }

    // Never create compute that could not register as a runner
    try {
      await github.createRunnerRegistrationToken(ctx, credential.token, target);
    } catch (error: unknown) {
      return reject('insufficient-permissions', `Runner registration probe failed: ${errorMessage(error)}`, occupancy);
    }

    ledger.record(repositoryId, this.clock.now());
    return { outcome: 'accept', credential, trigger: request.trigger, occupancy, queue };
  }
}
