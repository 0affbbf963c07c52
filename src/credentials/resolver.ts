import { NoCredentialError } from '../errors';
import type { GithubClient } from '../github/client';
import { Clock, systemClock } from '../lib/clock';
import { logger, LogContext } from '../logger';
import type { CredentialStore } from '../stores/credentialStore';
import type { InstallationDirectory } from '../stores/installationDirectory';
import { AppIdentity, mintAppJwt } from './appJwt';

export type CredentialSource = 'installation' | 'stored' | 'static';

export interface Credential {
  token: string;
  source: CredentialSource;
  accountLogin: string;
  installationId: number | null;
  expiresAt: Date | null;
}

export interface CredentialResolverOptions {
  directory: Pick<InstallationDirectory, 'findByAccountLogin'>;
  credentials: CredentialStore;
  github: Pick<GithubClient, 'createInstallationAccessToken'>;
  appIdentity: AppIdentity | null;
  staticToken?: string;
  clock?: Clock;
}

export interface CredentialProvider {
  resolve(accountLogin: string, ctx?: LogContext): Promise<Credential>;
}

/**
 * Resolves a bearer credential for an account: installation token first, then the
 * account's stored token, then the statically configured one.
 */
export class CredentialResolver implements CredentialProvider {
  private readonly clock: Clock;

  constructor(private readonly options: CredentialResolverOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get appConfigured(): boolean {
    return this.options.appIdentity !== null;
  }

  async appJwt(): Promise<string> {
    if (!this.options.appIdentity) {
      throw new NoCredentialError('github-app');
    }
    return mintAppJwt(this.options.appIdentity, this.clock.now());
  }

  async exchangeInstallationToken(installationId: number, ctx?: LogContext): Promise<{ token: string; expiresAt: Date | null }> {
    const jwt = await this.appJwt();
    const issued = await this.options.github.createInstallationAccessToken(ctx, jwt, installationId);
    return { token: issued.token, expiresAt: issued.expires_at ? new Date(issued.expires_at) : null };
  }

  async resolve(accountLogin: string, ctx?: LogContext): Promise<Credential> {
    const installation = await this.options.directory.findByAccountLogin(accountLogin);

    if (installation && installation.suspendedAt) {
      logger.warn(ctx, 'Installation suspended, using fallback credential', {
        accountLogin,
        installationId: installation.installationId,
      });
    } else if (installation && this.appConfigured) {
      // Exchange failures propagate; callers fold them into their own failure path
      const issued = await this.exchangeInstallationToken(installation.installationId, ctx);
      logger.debug(ctx, 'Using installation credential', { accountLogin, installationId: installation.installationId });
      return {
        token: issued.token,
        source: 'installation',
        accountLogin,
        installationId: installation.installationId,
        expiresAt: issued.expiresAt,
      };
    }

    const stored = await this.options.credentials.findLatestByAccountLogin(accountLogin);
    if (stored) {
      logger.debug(ctx, 'Using stored credential', { accountLogin });
      return { token: stored.token, source: 'stored', accountLogin, installationId: null, expiresAt: null };
    }

    if (this.options.staticToken) {
      logger.debug(ctx, 'Using static credential', { accountLogin });
      return { token: this.options.staticToken, source: 'static', accountLogin, installationId: null, expiresAt: null };
    }

    throw new NoCredentialError(accountLogin);
  }
}
