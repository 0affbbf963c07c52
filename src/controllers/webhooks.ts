import * as z from 'zod';
import { randomBytes, randomUUID } from 'crypto';
import type { CredentialProvider } from '../credentials/resolver';
import type { WebhookRegistration } from '../entities/WebhookRegistration';
import { NotFoundError } from '../errors';
import { HOOK_EVENTS, type GithubClient } from '../github/client';
import { Clock, systemClock } from '../lib/clock';
import { logger } from '../logger';
import type { RouteHandler } from '../router';
import type { RegistrationStore } from '../stores/registrationStore';
import type { RepositoryStore } from '../stores/repositoryStore';

const registerSchema = z.object({
  repositoryId: z.number().int().positive(),
  // Issue a fresh secret (and hook) even when one is active
  rotate: z.boolean().optional().default(false),
}).strict();

const searchSchema = z.object({
  id: z.string().uuid().optional(),
  repositoryId: z.number().int().positive().optional(),
  active: z.boolean().optional(),
  limit: z.number().int().min(1).max(100).optional().default(10),
  offset: z.number().int().min(0).optional().default(0),
  orderByDir: z.enum(['ASC', 'DESC']).optional().default('DESC'),
}).strict();

export interface WebhookAdminDeps {
  registrations: RegistrationStore;
  repositories: RepositoryStore;
  credentials: CredentialProvider;
  github: Pick<GithubClient, 'createRepositoryWebhook'>;
  // public origin GitHub delivers to
  backendOrigin: string;
  clock?: Clock;
}

export const secretPreview = (secret: string): string => `${secret.slice(0, 4)}…`;

// A hook pointing at localhost can never be reached by GitHub; register locally only
export const isLocalOrigin = (url: string): boolean => {
  const { hostname } = new URL(url);
  return hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]';
};

export const generateWebhookSecret = (): string => randomBytes(32).toString('base64url');

// Public view of a registration; the secret itself is never returned
const toView = (registration: WebhookRegistration) => ({
  id: registration.id,
  repositoryId: registration.repositoryId,
  webhookId: registration.remoteHookId,
  url: registration.url,
  events: registration.events,
  active: registration.active,
  secretPreview: secretPreview(registration.secret),
  createdAt: registration.createdAt,
  updatedAt: registration.updatedAt,
});

export const createWebhookAdminHandlers = (deps: WebhookAdminDeps) => {
  const clock = deps.clock ?? systemClock;

  const register: RouteHandler = async (req, res) => {
    const data = registerSchema.parse(req.body);
    const repository = await deps.repositories.findById(data.repositoryId);
    if (!repository) {
      throw new NotFoundError('Repository not found');
    }

    const existing = await deps.registrations.findActiveByRepository(repository.id);
    if (existing && !data.rotate) {
      res.status(200).json({ ok: true, message: 'Webhook already registered', registration: toView(existing) });
      return;
    }

    const secret = generateWebhookSecret();
    const url = `${deps.backendOrigin.replace(/\/+$/, '')}/webhooks/github`;
    let remoteHookId: string;
    if (isLocalOrigin(url)) {
      // Suffix keeps same-second rotations off the (repositoryId, remoteHookId) unique index
      remoteHookId = `local-dev-webhook-${repository.id}-${Math.floor(clock.now() / 1000)}-${randomUUID().slice(0, 8)}`;
      logger.warn(req, 'Local origin, webhook not created on GitHub', { repositoryId: repository.id, url });
    } else {
      const credential = await deps.credentials.resolve(repository.ownerLogin, req);
      const hook = await deps.github.createRepositoryWebhook(
        req,
        credential.token,
        { owner: repository.ownerLogin, name: repository.name },
        { url, secret, events: HOOK_EVENTS }
      );
      remoteHookId = String(hook.id);
    }

    const saved = await deps.registrations.replaceActive({
      repositoryId: repository.id,
      remoteHookId,
      secret,
      url,
      events: HOOK_EVENTS,
    });
    logger.info(req, existing ? 'Webhook secret rotated' : 'Webhook registered', {
      repositoryId: repository.id,
      registrationId: saved.id,
      webhookId: remoteHookId,
    });
    res.status(201).json({
      ok: true,
      message: existing ? 'Webhook rotated' : 'Webhook registered',
      registration: toView(saved),
    });
  };

  const search: RouteHandler = async (req, res) => {
    const filters = searchSchema.parse(req.body);
    const { items, total } = await deps.registrations.search(filters);
    res.status(200).json({ items: items.map(toView), total, limit: filters.limit, offset: filters.offset });
  };

  return { register, search };
};
