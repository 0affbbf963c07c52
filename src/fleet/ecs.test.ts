import { DescribeTasksCommand, ECSClient, ListTasksCommand, RunTaskCommand } from '@aws-sdk/client-ecs';
import { mockClient } from 'aws-sdk-client-mock';
import { ProvisioningError, RemoteCallError } from '../errors';
import { EcsFleet, taskIdFromArn } from './ecs';

const ecsMock = mockClient(ECSClient);

const taskArn = (id: string) => `arn:aws:ecs:us-east-1:000000000000:task/ci-runners/${id}`;

const fleet = new EcsFleet({
  client: new ECSClient({ region: 'us-east-1' }),
  cluster: 'ci-runners',
  family: 'github-runner-task',
  containerName: 'github-runner',
  subnets: ['subnet-a', 'subnet-b'],
  securityGroups: [],
  assignPublicIp: 'ENABLED',
  runnerLabels: 'self-hosted,linux',
});

const spec = { target: { owner: 'acme', name: 'widgets' }, token: 'test-token', trigger: 'workflow_job-job-build' };

describe('EcsFleet', () => {
  beforeEach(() => {
    ecsMock.reset();
  });

  it('extracts task ids from ARNs', () => {
    expect(taskIdFromArn(taskArn('abc123'))).toBe('abc123');
  });

  it('counts running and pending tasks across pages', async () => {
    ecsMock
      .on(ListTasksCommand, { desiredStatus: 'RUNNING' })
      .resolvesOnce({ taskArns: [taskArn('r1')], nextToken: 'page-2' })
      .resolvesOnce({ taskArns: [taskArn('r2')] });
    ecsMock.on(ListTasksCommand, { desiredStatus: 'PENDING' }).resolves({ taskArns: [taskArn('p1')] });

    await expect(fleet.occupancy()).resolves.toEqual({ running: 2, pending: 1, total: 3 });

    const runningCalls = ecsMock
      .commandCalls(ListTasksCommand)
      .map((call) => call.args[0].input)
      .filter((input) => input.desiredStatus === 'RUNNING');
    expect(runningCalls.map((input) => input.nextToken)).toEqual([undefined, 'page-2']);
    expect(runningCalls[0]).toMatchObject({ cluster: 'ci-runners', family: 'github-runner-task' });
  });

  it('wraps listing failures as RemoteCallError', async () => {
    ecsMock.on(ListTasksCommand).rejects(new Error('ThrottlingException'));
    await expect(fleet.occupancy()).rejects.toBeInstanceOf(RemoteCallError);
  });

  it('launches one Fargate task with the runner environment', async () => {
    ecsMock.on(RunTaskCommand).resolves({ tasks: [{ taskArn: taskArn('abc123') }], failures: [] });

    await expect(fleet.launch(spec)).resolves.toEqual({ taskArn: taskArn('abc123'), taskId: 'abc123' });

    const input = ecsMock.commandCalls(RunTaskCommand)[0].args[0].input;
    expect(input).toMatchObject({
      cluster: 'ci-runners',
      taskDefinition: 'github-runner-task',
      launchType: 'FARGATE',
      count: 1,
      networkConfiguration: {
        awsvpcConfiguration: { subnets: ['subnet-a', 'subnet-b'], securityGroups: undefined, assignPublicIp: 'ENABLED' },
      },
    });
    expect(input.overrides?.containerOverrides).toEqual([
      {
        name: 'github-runner',
        environment: [
          { name: 'GH_OWNER', value: 'acme' },
          { name: 'GH_REPO', value: 'widgets' },
          { name: 'GITHUB_TOKEN', value: 'test-token' },
          { name: 'RUNNER_TRIGGER', value: 'workflow_job-job-build' },
          { name: 'RUNNER_LABELS', value: 'self-hosted,linux' },
        ],
      },
    ]);
  });

  it('fails the launch when ECS reports a failure', async () => {
    ecsMock.on(RunTaskCommand).resolves({ tasks: [], failures: [{ reason: 'RESOURCE:MEMORY' }] });
    await expect(fleet.launch(spec)).rejects.toThrow(new ProvisioningError('RunTask rejected: RESOURCE:MEMORY'));
  });

  it('fails the launch when no task comes back', async () => {
    ecsMock.on(RunTaskCommand).resolves({});
    await expect(fleet.launch(spec)).rejects.toThrow('RunTask returned no task');
  });

  it('wraps client errors in ProvisioningError', async () => {
    ecsMock.on(RunTaskCommand).rejects(new Error('AccessDeniedException'));
    await expect(fleet.launch(spec)).rejects.toMatchObject({
      name: 'ProvisioningError',
      message: 'RunTask failed: AccessDeniedException',
    });
  });

  it('describes tasks with their trigger annotation', async () => {
    ecsMock.on(ListTasksCommand, { desiredStatus: 'STOPPED' }).resolves({ taskArns: [taskArn('s1')] });
    ecsMock.on(DescribeTasksCommand).resolves({
      tasks: [
        {
          taskArn: taskArn('s1'),
          lastStatus: 'STOPPED',
          createdAt: new Date('2024-05-01T10:00:00Z'),
          stoppedAt: new Date('2024-05-01T10:30:00Z'),
          stoppedReason: 'Essential container in task exited',
          overrides: {
            containerOverrides: [{ name: 'github-runner', environment: [{ name: 'RUNNER_TRIGGER', value: 'push-push-main' }] }],
          },
        },
      ],
    });

    await expect(fleet.describe('STOPPED', 10)).resolves.toEqual([
      {
        taskId: 's1',
        lastStatus: 'STOPPED',
        createdAt: new Date('2024-05-01T10:00:00Z'),
        stoppedAt: new Date('2024-05-01T10:30:00Z'),
        stoppedReason: 'Essential container in task exited',
        trigger: 'push-push-main',
      },
    ]);
  });
});
