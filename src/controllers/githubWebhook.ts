import type { Request, Response } from 'express';
import type { AdmissionController } from '../admission/controller';
import { AuthenticationFailure, errorMessage } from '../errors';
import type { Provisioner } from '../fleet/provisioner';
import { logger } from '../logger';
import type { RouteHandler } from '../router';
import type { InstallationDirectory } from '../stores/installationDirectory';
import type { RegistrationStore } from '../stores/registrationStore';
import type { RepositoryStore } from '../stores/repositoryStore';
import { classify, InstallationChange } from '../webhooks/classifier';
import { findMatchingRegistration } from '../webhooks/signature';

export interface GithubWebhookDeps {
  registrations: Pick<RegistrationStore, 'listActive'>;
  repositories: RepositoryStore;
  installations: Pick<InstallationDirectory, 'upsert' | 'delete'>;
  admission: Pick<AdmissionController, 'admit'>;
  provisioner: Pick<Provisioner, 'launch'>;
}

interface DeliveryResponse {
  ok: boolean;
  event: string;
  message: string;
  decision?: { outcome: 'accept' | 'reject'; reason?: string; taskId?: string };
}

const reply = (res: Response, body: DeliveryResponse) => {
  res.status(200).json(body);
};

const applyInstallationChange = async (req: Request, deps: GithubWebhookDeps, change: InstallationChange): Promise<void> => {
  switch (change.kind) {
    case 'upsert': {
      const saved = await deps.installations.upsert(change.installation);
      logger.info(req, 'Installation stored', {
        action: change.action,
        installationId: saved.installationId,
        accountLogin: saved.accountLogin,
        suspended: saved.suspendedAt !== null,
      });
      return;
    }
    case 'delete': {
      const removed = await deps.installations.delete(change.installationId);
      logger.info(req, 'Installation removed', {
        installationId: change.installationId,
        accountLogin: change.accountLogin,
        found: removed,
      });
      return;
    }
    case 'log':
      logger.info(req, 'Installation repositories changed', {
        action: change.action,
        installationId: change.installationId,
        repositoryCount: change.repositoryCount,
      });
  }
};

/**
 * POST /webhooks/github. Every verified delivery is answered 200 so GitHub does not
 * redeliver decisions (rejections included); only a bad signature (401) or an
 * unparseable verified body (400) fail.
 */
export const createGithubWebhookHandler = (deps: GithubWebhookDeps): RouteHandler => async (req, res) => {
  const event = req.header('x-github-event') ?? 'unknown';
  req.deliveryId = req.header('x-github-delivery');
  const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

  const registrations = await deps.registrations.listActive();
  const registration = findMatchingRegistration(registrations, rawBody, req.header('x-hub-signature-256'));
  if (!registration) {
    logger.warn(req, 'Webhook signature rejected', { event, activeRegistrations: registrations.length });
    throw new AuthenticationFailure();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString('utf8'));
  } catch (error: unknown) {
    logger.warn(req, 'Webhook body is not JSON', { event, error: errorMessage(error) });
    res.status(400).json({ error: 'Invalid JSON payload' });
    return;
  }

  const intent = classify(event, payload);
  logger.info(req, 'Webhook classified', { event, intent: intent.kind, registrationId: registration.id });

  if (intent.kind === 'ignore') {
    reply(res, { ok: true, event, message: intent.message });
    return;
  }

  if (intent.kind === 'acknowledge') {
    if (intent.installationChange) {
      try {
        await applyInstallationChange(req, deps, intent.installationChange);
      } catch (error: unknown) {
        logger.error(req, 'Installation change failed', { event, error: errorMessage(error) });
        reply(res, { ok: false, event, message: 'Installation change failed' });
        return;
      }
    }
    reply(res, { ok: true, event, message: intent.message });
    return;
  }

  const repository = await deps.repositories.findById(registration.repositoryId);
  if (!repository) {
    logger.error(req, 'Registration points at an unknown repository', { repositoryId: registration.repositoryId });
    reply(res, { ok: false, event, message: 'Repository not found' });
    return;
  }
  const target = { owner: repository.ownerLogin, name: repository.name };

  const decision = await deps.admission.admit(
    {
      repositoryId: repository.id,
      target,
      eventType: intent.eventType,
      action: intent.action,
      runId: intent.runId,
      trigger: intent.trigger,
    },
    req
  );
  if (decision.outcome === 'reject') {
    reply(res, { ok: true, event, message: decision.detail, decision: { outcome: 'reject', reason: decision.reason } });
    return;
  }

  const launched = await deps.provisioner.launch(
    {
      eventType: intent.eventType,
      action: intent.action,
      target,
      credential: decision.credential,
      trigger: decision.trigger,
    },
    req
  );
  if (!launched.ok) {
    reply(res, { ok: true, event, message: 'Runner task creation failed', decision: { outcome: 'accept' } });
    return;
  }
  reply(res, {
    ok: true,
    event,
    message: 'Runner task created',
    decision: { outcome: 'accept', taskId: launched.task.taskId },
  });
};
