import { HttpClient } from '../httpclient';
import type { RequestOptions } from '../httpclient/types';
import type { LogContext } from '../logger';
import type {
  GithubInstallation,
  GithubRepositorySummary,
  InstallationAccessToken,
  JobQueueDepth,
  RepositoryCoordinates,
  RepositoryHook,
  RunnerToken,
  SelfHostedRunner,
  WorkflowJob,
} from './types';

export interface GithubClientOptions {
  baseUrl: string;
  timeout: number;
  retryCount?: number;
}

// Events a repository hook subscribes to; only these can reach the classifier as provision candidates
export const HOOK_EVENTS = ['push', 'workflow_job', 'workflow_run'];

const repoPath = (target: RepositoryCoordinates): string =>
  `/repos/${encodeURIComponent(target.owner)}/${encodeURIComponent(target.name)}`;

const bearer = (token: string): RequestOptions['headers'] => ({ Authorization: `Bearer ${token}` });

// Thin typed wrapper over the GitHub REST endpoints consumed here (all bearer-authenticated)
export class GithubClient {
  private http: HttpClient;

  constructor(options: GithubClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.baseUrl,
      service: 'github',
      timeout: options.timeout,
      retryCount: options.retryCount ?? 0,
      headers: {
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });
  }

  async createInstallationAccessToken(ctx: LogContext | undefined, appJwt: string, installationId: number): Promise<InstallationAccessToken> {
    const res = await this.http.post<InstallationAccessToken>(ctx, `/app/installations/${installationId}/access_tokens`, undefined, {
      headers: bearer(appJwt),
      operation: 'create installation access token',
    });
    return res.data;
  }

  async listAppInstallations(ctx: LogContext | undefined, appJwt: string): Promise<GithubInstallation[]> {
    const res = await this.http.get<GithubInstallation[]>(ctx, '/app/installations?per_page=100', {
      headers: bearer(appJwt),
      operation: 'list app installations',
    });
    return res.data;
  }

  async listInstallationRepositories(ctx: LogContext | undefined, installationToken: string): Promise<GithubRepositorySummary[]> {
    const res = await this.http.get<{ repositories?: GithubRepositorySummary[] }>(ctx, '/installation/repositories?per_page=100', {
      headers: bearer(installationToken),
      operation: 'list installation repositories',
    });
    return res.data.repositories ?? [];
  }

  async listWorkflowRunJobs(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates, runId: number): Promise<WorkflowJob[]> {
    const res = await this.http.get<{ jobs?: WorkflowJob[] }>(ctx, `${repoPath(target)}/actions/runs/${runId}/jobs?per_page=100`, {
      headers: bearer(token),
      operation: 'list workflow run jobs',
    });
    return res.data.jobs ?? [];
  }

  // Remote queue depth for one workflow run
  async getRunQueueDepth(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates, runId: number): Promise<JobQueueDepth> {
    const jobs = await this.listWorkflowRunJobs(ctx, token, target, runId);
    return {
      queued: jobs.filter((job) => job.status === 'queued').length,
      inProgress: jobs.filter((job) => job.status === 'in_progress').length,
      total: jobs.length,
    };
  }

  async createRunnerRegistrationToken(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates): Promise<RunnerToken> {
    const res = await this.http.post<RunnerToken>(ctx, `${repoPath(target)}/actions/runners/registration-token`, undefined, {
      headers: bearer(token),
      operation: 'create runner registration token',
    });
    return res.data;
  }

  async createRunnerRemovalToken(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates): Promise<RunnerToken> {
    const res = await this.http.post<RunnerToken>(ctx, `${repoPath(target)}/actions/runners/remove-token`, undefined, {
      headers: bearer(token),
      operation: 'create runner removal token',
    });
    return res.data;
  }

  async listRunners(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates): Promise<SelfHostedRunner[]> {
    const res = await this.http.get<{ runners?: SelfHostedRunner[] }>(ctx, `${repoPath(target)}/actions/runners?per_page=100`, {
      headers: bearer(token),
      operation: 'list runners',
    });
    return res.data.runners ?? [];
  }

  // true only when GitHub answers 204 No Content
  async removeRunner(ctx: LogContext | undefined, token: string, target: RepositoryCoordinates, runnerId: number): Promise<boolean> {
    const res = await this.http.delete<unknown>(ctx, `${repoPath(target)}/actions/runners/${runnerId}`, {
      headers: bearer(token),
      operation: 'remove runner',
    });
    return res.status === 204;
  }

  async createRepositoryWebhook(
    ctx: LogContext | undefined,
    token: string,
    target: RepositoryCoordinates,
    hook: { url: string; secret: string; events?: string[] }
  ): Promise<RepositoryHook> {
    const res = await this.http.post<RepositoryHook>(
      ctx,
      `${repoPath(target)}/hooks`,
      {
        name: 'web',
        active: true,
        events: hook.events ?? HOOK_EVENTS,
        config: {
          url: hook.url,
          content_type: 'json',
          insecure_ssl: '0',
          secret: hook.secret,
        },
      },
      { headers: bearer(token), operation: 'create repository webhook' }
    );
    return res.data;
  }
}
