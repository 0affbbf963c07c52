import {
  DescribeTasksCommand,
  ECSClient,
  KeyValuePair,
  ListTasksCommand,
  RunTaskCommand,
} from '@aws-sdk/client-ecs';
import { ProvisioningError, RemoteCallError, errorMessage } from '../errors';
import type { RepositoryCoordinates } from '../github/types';
import { logger, LogContext } from '../logger';

export type TaskStatus = 'RUNNING' | 'PENDING' | 'STOPPED';

export interface FleetOccupancy {
  running: number;
  pending: number;
  total: number;
}

export interface TaskHandle {
  taskArn: string;
  taskId: string;
}

export interface LaunchSpec {
  target: RepositoryCoordinates;
  token: string;
  trigger: string;
}

export interface TaskSummary {
  taskId: string;
  lastStatus: string;
  createdAt: Date | null;
  stoppedAt: Date | null;
  stoppedReason: string | null;
  trigger: string | null;
}

// Read side of the compute control plane used by admission
export interface FleetMonitor {
  occupancy(ctx?: LogContext): Promise<FleetOccupancy>;
}

export interface TaskLauncher {
  launch(spec: LaunchSpec, ctx?: LogContext): Promise<TaskHandle>;
}

export interface EcsFleetOptions {
  client: ECSClient;
  cluster: string;
  family: string;
  containerName: string;
  subnets: string[];
  securityGroups: string[];
  assignPublicIp: 'ENABLED' | 'DISABLED';
  runnerLabels: string;
}

export const RUNNER_TRIGGER_ENV = 'RUNNER_TRIGGER';

// Every ECS call is bounded by the request handler timeout
export const createEcsClient = (region: string, timeoutMs: number): ECSClient =>
  new ECSClient({
    region,
    maxAttempts: 1,
    requestHandler: { requestTimeout: timeoutMs, connectionTimeout: timeoutMs },
  });

export const taskIdFromArn = (arn: string): string => arn.split('/').pop() ?? arn;

const wrap = (operation: string, error: unknown): RemoteCallError =>
  new RemoteCallError('ecs', operation, errorMessage(error), {
    timedOut: error instanceof Error && error.name === 'TimeoutError',
    cause: error,
  });

export class EcsFleet implements FleetMonitor, TaskLauncher {
  constructor(private readonly options: EcsFleetOptions) {}

  async listTaskArns(status: TaskStatus): Promise<string[]> {
    const arns: string[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const out = await this.options.client.send(
          new ListTasksCommand({
            cluster: this.options.cluster,
            family: this.options.family,
            desiredStatus: status,
            nextToken,
          })
        );
        arns.push(...(out.taskArns ?? []));
        nextToken = out.nextToken;
      } while (nextToken);
    } catch (error: unknown) {
      throw wrap(`list ${status.toLowerCase()} tasks`, error);
    }
    return arns;
  }

  // running + pending tasks of the runner family
  async occupancy(ctx?: LogContext): Promise<FleetOccupancy> {
    const [running, pending] = await Promise.all([this.listTaskArns('RUNNING'), this.listTaskArns('PENDING')]);
    const occupancy = { running: running.length, pending: pending.length, total: running.length + pending.length };
    logger.debug(ctx, 'Fleet occupancy', occupancy);
    return occupancy;
  }

  buildEnvironment(spec: LaunchSpec): KeyValuePair[] {
    return [
      { name: 'GH_OWNER', value: spec.target.owner },
      { name: 'GH_REPO', value: spec.target.name },
      { name: 'GITHUB_TOKEN', value: spec.token },
      { name: RUNNER_TRIGGER_ENV, value: spec.trigger },
      { name: 'RUNNER_LABELS', value: this.options.runnerLabels },
    ];
  }

  async launch(spec: LaunchSpec, ctx?: LogContext): Promise<TaskHandle> {
    let taskArn: string | undefined;
    try {
      const out = await this.options.client.send(
        new RunTaskCommand({
          cluster: this.options.cluster,
          taskDefinition: this.options.family,
          launchType: 'FARGATE',
          count: 1,
          startedBy: 'runner-admission-controller',
          networkConfiguration: {
            awsvpcConfiguration: {
              subnets: this.options.subnets,
              securityGroups: this.options.securityGroups.length > 0 ? this.options.securityGroups : undefined,
              assignPublicIp: this.options.assignPublicIp,
            },
          },
          overrides: {
            containerOverrides: [{ name: this.options.containerName, environment: this.buildEnvironment(spec) }],
          },
        })
      );
      const failure = out.failures?.[0];
      if (failure) {
        throw new ProvisioningError(`RunTask rejected: ${failure.reason ?? 'unknown reason'}`);
      }
      taskArn = out.tasks?.[0]?.taskArn;
    } catch (error: unknown) {
      if (error instanceof ProvisioningError) throw error;
      throw new ProvisioningError(`RunTask failed: ${errorMessage(error)}`, wrap('run task', error));
    }
    if (!taskArn) {
      throw new ProvisioningError('RunTask returned no task');
    }
    const handle = { taskArn, taskId: taskIdFromArn(taskArn) };
    logger.info(ctx, 'Runner task created', { taskId: handle.taskId, owner: spec.target.owner, repo: spec.target.name });
    return handle;
  }

  // Task details for the monitor script (DescribeTasks caps at 100 ARNs)
  async describe(status: TaskStatus, limit = 100): Promise<TaskSummary[]> {
    const arns = (await this.listTaskArns(status)).slice(0, Math.min(limit, 100));
    if (arns.length === 0) {
      return [];
    }
    try {
      const out = await this.options.client.send(new DescribeTasksCommand({ cluster: this.options.cluster, tasks: arns }));
      return (out.tasks ?? []).map((task) => {
        const trigger = (task.overrides?.containerOverrides ?? [])
          .flatMap((container) => container.environment ?? [])
          .find((env) => env.name === RUNNER_TRIGGER_ENV);
        return {
          taskId: taskIdFromArn(task.taskArn ?? 'unknown'),
          lastStatus: task.lastStatus ?? 'UNKNOWN',
          createdAt: task.createdAt ?? null,
          stoppedAt: task.stoppedAt ?? null,
          stoppedReason: task.stoppedReason ?? null,
          trigger: trigger?.value ?? null,
        };
      });
    } catch (error: unknown) {
      throw wrap('describe tasks', error);
    }
  }
}
