// Subsets of GitHub REST payloads this service reads. Unlisted fields are ignored.

export interface GithubAccount {
  id: number;
  login: string;
  type: string;
}

export interface GithubInstallation {
  id: number;
  account: GithubAccount | null;
  permissions?: Record<string, string>;
  events?: string[];
  suspended_at?: string | null;
}

export interface InstallationAccessToken {
  token: string;
  expires_at: string;
}

export interface GithubRepositorySummary {
  id: number;
  name: string;
  full_name: string;
  owner: { login: string };
  private: boolean;
}

export type WorkflowJobStatus = 'queued' | 'in_progress' | 'completed' | 'waiting' | 'requested' | 'pending';

export interface WorkflowJob {
  id: number;
  run_id: number;
  name: string;
  status: WorkflowJobStatus;
  labels?: string[];
}

export interface RunnerToken {
  token: string;
  expires_at: string;
}

export interface SelfHostedRunner {
  id: number;
  name: string;
  os: string;
  status: string;
  busy: boolean;
  labels: { name: string }[];
}

export interface RepositoryHook {
  id: number;
  active: boolean;
  events: string[];
}

export interface JobQueueDepth {
  queued: number;
  inProgress: number;
  total: number;
}

export interface RepositoryCoordinates {
  owner: string;
  name: string;
}
