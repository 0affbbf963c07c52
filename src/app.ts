import type { Express } from 'express';
import type { DataSource } from 'typeorm';
import { AdmissionController } from './admission/controller';
import { CooldownLedger, InMemoryCooldownLedger } from './admission/cooldownLedger';
import type { Config } from './config/config';
import { createFleetHandlers } from './controllers/fleet';
import { createGithubWebhookHandler } from './controllers/githubWebhook';
import { createInstallationHandlers } from './controllers/installations';
import { createRunnerHandlers } from './controllers/runners';
import { createWebhookAdminHandlers } from './controllers/webhooks';
import { AppIdentity, loadAppIdentity } from './credentials/appJwt';
import { CredentialResolver } from './credentials/resolver';
import { createEcsClient, EcsFleet, FleetMonitor, TaskLauncher } from './fleet/ecs';
import { Provisioner } from './fleet/provisioner';
import { GithubClient } from './github/client';
import { Clock, systemClock } from './lib/clock';
import { createRouter, type Route } from './router';
import { TypeormCredentialStore } from './stores/credentialStore';
import { InstallationDirectory, TypeormInstallationDirectory } from './stores/installationDirectory';
import { RegistrationStore, TypeormRegistrationStore } from './stores/registrationStore';
import { RepositoryStore, TypeormRepositoryStore } from './stores/repositoryStore';

export interface Services {
  dataSource: DataSource;
  registrations: RegistrationStore;
  repositories: RepositoryStore;
  installations: InstallationDirectory;
  github: GithubClient;
  resolver: CredentialResolver;
  fleet: FleetMonitor & TaskLauncher;
  ledger: CooldownLedger;
  admission: AdmissionController;
  provisioner: Provisioner;
  clock: Clock;
}

// Collaborators that tests (and the monitor script) swap for in-process stand-ins
export interface ServiceOverrides {
  fleet?: FleetMonitor & TaskLauncher;
  appIdentity?: AppIdentity | null;
  clock?: Clock;
}

export const createFleet = (cfg: Config): EcsFleet =>
  new EcsFleet({
    client: createEcsClient(cfg.AWS_REGION, cfg.ECS_TIMEOUT_MS),
    cluster: cfg.ECS_CLUSTER,
    family: cfg.ECS_TASK_DEFINITION,
    containerName: cfg.ECS_CONTAINER_NAME,
    subnets: cfg.ECS_SUBNET_IDS,
    securityGroups: cfg.ECS_SECURITY_GROUP_IDS,
    assignPublicIp: cfg.ECS_ASSIGN_PUBLIC_IP,
    runnerLabels: cfg.RUNNER_LABELS,
  });

export const createServices = (dataSource: DataSource, cfg: Config, overrides: ServiceOverrides = {}): Services => {
  const clock = overrides.clock ?? systemClock;
  const installations = new TypeormInstallationDirectory(dataSource);
  const github = new GithubClient({
    baseUrl: cfg.GITHUB_API_URL,
    timeout: cfg.GITHUB_TIMEOUT_MS,
    retryCount: cfg.GITHUB_RETRY_COUNT,
  });
  const resolver = new CredentialResolver({
    directory: installations,
    credentials: new TypeormCredentialStore(dataSource),
    github,
    appIdentity: overrides.appIdentity !== undefined ? overrides.appIdentity : loadAppIdentity(cfg),
    staticToken: cfg.GITHUB_FALLBACK_TOKEN || undefined,
    clock,
  });
  const fleet = overrides.fleet ?? createFleet(cfg);
  const ledger = new InMemoryCooldownLedger(cfg.ADMISSION_LEDGER_HORIZON_SECONDS * 1000, clock);
  const admission = new AdmissionController({
    ledger,
    fleet,
    credentials: resolver,
    github,
    policy: {
      cooldownMs: cfg.ADMISSION_COOLDOWN_SECONDS * 1000,
      maxOccupancy: cfg.ADMISSION_MAX_OCCUPANCY,
    },
    clock,
  });

  return {
    dataSource,
    registrations: new TypeormRegistrationStore(dataSource),
    repositories: new TypeormRepositoryStore(dataSource),
    installations,
    github,
    resolver,
    fleet,
    ledger,
    admission,
    provisioner: new Provisioner(fleet),
    clock,
  };
};

export const buildRoutes = (services: Services, cfg: Config): Route[] => {
  const webhooks = createWebhookAdminHandlers({
    registrations: services.registrations,
    repositories: services.repositories,
    credentials: services.resolver,
    github: services.github,
    backendOrigin: cfg.BACKEND_ORIGIN,
    clock: services.clock,
  });
  const installations = createInstallationHandlers({
    directory: services.installations,
    resolver: services.resolver,
    github: services.github,
  });
  const runners = createRunnerHandlers({ credentials: services.resolver, github: services.github });
  const fleet = createFleetHandlers({
    fleet: services.fleet,
    ledger: services.ledger,
    maxOccupancy: cfg.ADMISSION_MAX_OCCUPANCY,
    env: cfg.NODE_ENV,
    databaseReady: () => services.dataSource.isInitialized,
  });

  return [
    { route_name: 'health_check', method: 'GET', endpoint: '/health', auth: 'none', handler: fleet.health },
    {
      route_name: 'github_webhook',
      method: 'POST',
      endpoint: '/webhooks/github',
      auth: 'none',
      body: 'raw',
      handler: createGithubWebhookHandler({
        registrations: services.registrations,
        repositories: services.repositories,
        installations: services.installations,
        admission: services.admission,
        provisioner: services.provisioner,
      }),
    },
    { route_name: 'register_webhook', method: 'POST', endpoint: '/api/webhooks/register', handler: webhooks.register },
    { route_name: 'search_webhooks', method: 'POST', endpoint: '/api/webhooks/search', handler: webhooks.search },
    { route_name: 'list_installations', method: 'GET', endpoint: '/api/installations', handler: installations.listStored },
    { route_name: 'list_remote_installations', method: 'GET', endpoint: '/api/installations/remote', handler: installations.listRemote },
    { route_name: 'sync_installation', method: 'POST', endpoint: '/api/installations/:installationId/sync', handler: installations.sync },
    {
      route_name: 'list_installation_repositories',
      method: 'GET',
      endpoint: '/api/installations/:installationId/repositories',
      handler: installations.repositories,
    },
    {
      route_name: 'create_registration_token',
      method: 'POST',
      endpoint: '/api/runners/:owner/:repo/registration-token',
      handler: runners.registrationToken,
    },
    { route_name: 'create_removal_token', method: 'POST', endpoint: '/api/runners/:owner/:repo/removal-token', handler: runners.removalToken },
    { route_name: 'list_runners', method: 'GET', endpoint: '/api/runners/:owner/:repo', handler: runners.list },
    { route_name: 'remove_runner', method: 'DELETE', endpoint: '/api/runners/:owner/:repo/:runnerId', handler: runners.remove },
    { route_name: 'fleet_status', method: 'GET', endpoint: '/api/fleet', handler: fleet.status },
  ];
};

export const createApp = (services: Services, cfg: Config): Express =>
  createRouter(buildRoutes(services, cfg), { serviceAccountType: cfg.SERVICE_AUTH_ACCOUNT_TYPE });
