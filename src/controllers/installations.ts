import * as z from 'zod';
import type { CredentialResolver } from '../credentials/resolver';
import type { Installation } from '../entities/Installation';
import { AppError, NotFoundError } from '../errors';
import type { GithubClient } from '../github/client';
import type { GithubInstallation } from '../github/types';
import { logger } from '../logger';
import type { RouteHandler } from '../router';
import type { InstallationDirectory, InstallationInput } from '../stores/installationDirectory';

const installationParamsSchema = z.object({
  installationId: z.coerce.number().int().positive(),
});

export interface InstallationDeps {
  directory: InstallationDirectory;
  resolver: Pick<CredentialResolver, 'appJwt' | 'exchangeInstallationToken'>;
  github: Pick<GithubClient, 'listAppInstallations' | 'listInstallationRepositories'>;
}

const toView = (installation: Installation) => ({
  installationId: installation.installationId,
  accountId: installation.accountId,
  accountLogin: installation.accountLogin,
  accountType: installation.accountType,
  suspendedAt: installation.suspendedAt,
  permissions: installation.permissions,
  events: installation.events,
  updatedAt: installation.updatedAt,
});

// Remote installation -> directory record; null when GitHub omits the account
export const fromRemoteInstallation = (remote: GithubInstallation): InstallationInput | null => {
  if (!remote.account) {
    return null;
  }
  return {
    installationId: remote.id,
    accountId: remote.account.id,
    accountLogin: remote.account.login,
    accountType: remote.account.type === 'User' ? 'User' : 'Organization',
    suspendedAt: remote.suspended_at ? new Date(remote.suspended_at) : null,
    permissions: remote.permissions ?? null,
    events: remote.events ?? null,
  };
};

export const createInstallationHandlers = (deps: InstallationDeps) => {
  const listStored: RouteHandler = async (req, res) => {
    const installations = await deps.directory.list();
    res.status(200).json({ installations: installations.map(toView), total: installations.length });
  };

  const listRemote: RouteHandler = async (req, res) => {
    const jwt = await deps.resolver.appJwt();
    const installations = await deps.github.listAppInstallations(req, jwt);
    res.status(200).json({
      installations: installations.map((remote) => ({
        installationId: remote.id,
        accountLogin: remote.account?.login ?? null,
        accountType: remote.account?.type ?? null,
        suspendedAt: remote.suspended_at ?? null,
      })),
      total: installations.length,
    });
  };

  // Backfill for installations whose lifecycle events were missed
  const sync: RouteHandler = async (req, res) => {
    const { installationId } = installationParamsSchema.parse(req.params);
    const jwt = await deps.resolver.appJwt();
    const remote = (await deps.github.listAppInstallations(req, jwt)).find((item) => item.id === installationId);
    if (!remote) {
      throw new NotFoundError('Installation not found on GitHub');
    }
    const input = fromRemoteInstallation(remote);
    if (!input) {
      throw new AppError(422, 'Installation has no account');
    }
    const saved = await deps.directory.upsert(input);
    logger.info(req, 'Installation synced', { installationId, accountLogin: saved.accountLogin });
    res.status(200).json({ message: 'Installation synced', installation: toView(saved) });
  };

  const repositories: RouteHandler = async (req, res) => {
    const { installationId } = installationParamsSchema.parse(req.params);
    const stored = await deps.directory.findByInstallationId(installationId);
    if (!stored) {
      throw new NotFoundError('Installation not found');
    }
    const { token } = await deps.resolver.exchangeInstallationToken(installationId, req);
    const repos = await deps.github.listInstallationRepositories(req, token);
    res.status(200).json({
      installationId,
      repositories: repos.map((repo) => ({ id: repo.id, name: repo.name, fullName: repo.full_name, private: repo.private })),
      total: repos.length,
    });
  };

  return { listStored, listRemote, sync, repositories };
};
