import * as z from 'zod';
import type { AccountType } from '../entities/Installation';
import type { InstallationInput } from '../stores/installationDirectory';

export type ProvisionEventType = 'push' | 'workflow_job' | 'workflow_run';

export type InstallationChange =
  | { kind: 'upsert'; action: string; installation: InstallationInput }
  | { kind: 'delete'; action: string; installationId: number; accountLogin: string | null }
  | { kind: 'log'; action: string; installationId: number | null; repositoryCount: number };

export type Intent =
  | { kind: 'ignore'; eventType: string; message: string }
  | { kind: 'acknowledge'; eventType: string; message: string; installationChange?: InstallationChange }
  | {
      kind: 'provision';
      eventType: ProvisionEventType;
      action: string | null;
      runId: number | null;
      trigger: string;
      message: string;
    };

// Payload shapes are parsed leniently: unknown fields pass, missing ones become undefined
const actionSchema = z.object({ action: z.string().optional() }).passthrough();

const pushSchema = z
  .object({
    ref: z.string().optional(),
    commits: z.array(z.unknown()).nullable().optional(),
  })
  .passthrough();

const workflowJobSchema = z
  .object({
    action: z.string().optional(),
    workflow_job: z
      .object({ name: z.string().nullable().optional(), run_id: z.number().int().optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const workflowRunSchema = z
  .object({
    action: z.string().optional(),
    workflow_run: z.object({ name: z.string().nullable().optional() }).passthrough().nullable().optional(),
  })
  .passthrough();

const installationSchema = z
  .object({
    action: z.string().optional(),
    installation: z
      .object({
        id: z.number().int(),
        account: z
          .object({
            id: z.number().int(),
            login: z.string(),
            type: z.string().transform((type): AccountType => (type === 'User' ? 'User' : 'Organization')),
          })
          .passthrough(),
        permissions: z.record(z.string(), z.string()).optional(),
        events: z.array(z.string()).optional(),
        suspended_at: z.string().nullable().optional(),
      })
      .passthrough(),
  })
  .passthrough();

const installationRepositoriesSchema = z
  .object({
    action: z.string().optional(),
    installation: z.object({ id: z.number().int() }).passthrough().optional(),
    repositories_added: z.array(z.unknown()).optional(),
    repositories_removed: z.array(z.unknown()).optional(),
  })
  .passthrough();

const nameOrUnknown = (value: string | null | undefined): string => (value ? value : 'unknown');

const classifyInstallation = (payload: unknown): Intent => {
  const parsed = installationSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'acknowledge', eventType: 'installation', message: 'Installation payload not recognised' };
  }
  const action = parsed.data.action ?? 'unknown';
  const { installation } = parsed.data;
  if (action === 'deleted') {
    return {
      kind: 'acknowledge',
      eventType: 'installation',
      message: 'Installation removed',
      installationChange: { kind: 'delete', action, installationId: installation.id, accountLogin: installation.account.login },
    };
  }
  // created, suspend, unsuspend, new_permissions_accepted all refresh the record
  return {
    kind: 'acknowledge',
    eventType: 'installation',
    message: action === 'created' ? 'Installation recorded' : `Installation ${action} recorded`,
    installationChange: {
      kind: 'upsert',
      action,
      installation: {
        installationId: installation.id,
        accountId: installation.account.id,
        accountLogin: installation.account.login,
        accountType: installation.account.type,
        suspendedAt: installation.suspended_at ? new Date(installation.suspended_at) : null,
        permissions: installation.permissions ?? null,
        events: installation.events ?? null,
      },
    },
  };
};

const classifyInstallationRepositories = (payload: unknown): Intent => {
  const parsed = installationRepositoriesSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'acknowledge', eventType: 'installation_repositories', message: 'Installation repositories payload not recognised' };
  }
  const { action = 'unknown', installation, repositories_added: added, repositories_removed: removed } = parsed.data;
  const repositories = action === 'removed' ? removed : added;
  return {
    kind: 'acknowledge',
    eventType: 'installation_repositories',
    message: `Installation repositories ${action}`,
    installationChange: { kind: 'log', action, installationId: installation?.id ?? null, repositoryCount: repositories?.length ?? 0 },
  };
};

/**
 * Maps a GitHub delivery to an intent. Only events that reliably mean new queued work
 * become provision candidates; everything else riding the same hook is acknowledged or ignored.
 */
export function classify(eventType: string, payload: unknown): Intent {
  if (eventType === 'ping') {
    return { kind: 'acknowledge', eventType, message: 'Ping received' };
  }
  if (eventType === 'installation') {
    return classifyInstallation(payload);
  }
  if (eventType === 'installation_repositories') {
    return classifyInstallationRepositories(payload);
  }

  if (eventType === 'push') {
    const parsed = pushSchema.safeParse(payload);
    const commits = parsed.success ? parsed.data.commits ?? [] : [];
    if (commits.length === 0) {
      return { kind: 'ignore', eventType, message: 'No commits to process' };
    }
    const branch = parsed.success && parsed.data.ref ? parsed.data.ref.replace('refs/heads/', '') : 'unknown';
    return {
      kind: 'provision',
      eventType,
      action: null,
      runId: null,
      trigger: `push-push-${branch}`,
      message: 'Push with commits',
    };
  }

  if (eventType === 'workflow_job') {
    const parsed = workflowJobSchema.safeParse(payload);
    const action = parsed.success ? parsed.data.action ?? null : null;
    if (!parsed.success || action !== 'queued') {
      return { kind: 'ignore', eventType, message: `Ignored action: ${action ?? 'none'}` };
    }
    const job = parsed.data.workflow_job;
    return {
      kind: 'provision',
      eventType,
      action,
      runId: job?.run_id ?? null,
      trigger: `workflow_job-job-${nameOrUnknown(job?.name)}`,
      message: 'Workflow job queued',
    };
  }

  if (eventType === 'workflow_run') {
    const parsed = workflowRunSchema.safeParse(payload);
    const action = parsed.success ? parsed.data.action ?? null : null;
    if (!parsed.success || action !== 'requested') {
      return { kind: 'ignore', eventType, message: `Ignored action: ${action ?? 'none'}` };
    }
    return {
      kind: 'provision',
      eventType,
      action,
      runId: null,
      trigger: `workflow_run-workflow-${nameOrUnknown(parsed.data.workflow_run?.name)}`,
      message: 'Workflow run requested',
    };
  }

  const parsed = actionSchema.safeParse(payload);
  const action = parsed.success ? parsed.data.action : undefined;
  return { kind: 'acknowledge', eventType, message: action ? `No handler for ${eventType}(${action})` : `No handler for ${eventType}` };
}
