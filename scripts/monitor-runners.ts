import { createFleet } from '../src/app';
import { config } from '../src/config/config';
import { errorMessage } from '../src/errors';
import type { EcsFleet, TaskSummary } from '../src/fleet/ecs';

const STOPPED_SHOWN = 10;

const formatTask = (task: TaskSummary): string => {
  const created = task.createdAt ? task.createdAt.toISOString() : 'n/a';
  const parts = [`  ${task.taskId}`, task.lastStatus, `created ${created}`, `trigger ${task.trigger ?? 'n/a'}`];
  if (task.stoppedAt) {
    parts.push(`stopped ${task.stoppedAt.toISOString()}`);
  }
  if (task.stoppedReason) {
    parts.push(`(${task.stoppedReason})`);
  }
  return parts.join(' | ');
};

const printSection = (title: string, tasks: TaskSummary[]) => {
  console.log(`${title} (${tasks.length})`);
  if (tasks.length === 0) {
    console.log('  none');
  }
  tasks.forEach((task) => console.log(formatTask(task)));
};

// Snapshot of the runner fleet: what is running, what is starting, what stopped last and why
export async function monitorRunners(fleet: Pick<EcsFleet, 'describe'>): Promise<number> {
  const [running, pending, stopped] = await Promise.all([
    fleet.describe('RUNNING'),
    fleet.describe('PENDING'),
    fleet.describe('STOPPED', STOPPED_SHOWN),
  ]);
  const byNewest = (a: TaskSummary, b: TaskSummary) => (b.createdAt?.getTime() ?? 0) - (a.createdAt?.getTime() ?? 0);

  console.log(`Cluster ${config.ECS_CLUSTER}, task family ${config.ECS_TASK_DEFINITION}`);
  printSection('Running', running);
  printSection('Pending', pending);
  printSection(`Last ${STOPPED_SHOWN} stopped`, stopped.sort(byNewest).slice(0, STOPPED_SHOWN));

  const active = running.length + pending.length;
  console.log(`Summary: ${running.length} running, ${pending.length} pending, ${active} active`);
  if (active > 1) {
    console.warn(`Warning: ${active} runners active; duplicate provisioning is possible`);
  }
  return active;
}

if (require.main === module) {
  monitorRunners(createFleet(config))
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Monitor failed:', errorMessage(error));
      process.exit(1);
    });
}
