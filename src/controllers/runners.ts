import * as z from 'zod';
import type { CredentialProvider } from '../credentials/resolver';
import { AppError } from '../errors';
import type { GithubClient } from '../github/client';
import { logger } from '../logger';
import type { RouteHandler } from '../router';

const repoParamsSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
});

const runnerParamsSchema = repoParamsSchema.extend({
  runnerId: z.coerce.number().int().positive(),
});

export interface RunnerDeps {
  credentials: CredentialProvider;
  github: Pick<GithubClient, 'createRunnerRegistrationToken' | 'createRunnerRemovalToken' | 'listRunners' | 'removeRunner'>;
}

// Runner management on behalf of the repository owner's credential
export const createRunnerHandlers = (deps: RunnerDeps) => {
  const registrationToken: RouteHandler = async (req, res) => {
    const { owner, repo } = repoParamsSchema.parse(req.params);
    const credential = await deps.credentials.resolve(owner, req);
    const issued = await deps.github.createRunnerRegistrationToken(req, credential.token, { owner, name: repo });
    res.status(201).json({ token: issued.token, expiresAt: issued.expires_at });
  };

  const removalToken: RouteHandler = async (req, res) => {
    const { owner, repo } = repoParamsSchema.parse(req.params);
    const credential = await deps.credentials.resolve(owner, req);
    const issued = await deps.github.createRunnerRemovalToken(req, credential.token, { owner, name: repo });
    res.status(201).json({ token: issued.token, expiresAt: issued.expires_at });
  };

  const list: RouteHandler = async (req, res) => {
    const { owner, repo } = repoParamsSchema.parse(req.params);
    const credential = await deps.credentials.resolve(owner, req);
    const runners = await deps.github.listRunners(req, credential.token, { owner, name: repo });
    res.status(200).json({
      runners: runners.map((runner) => ({
        id: runner.id,
        name: runner.name,
        os: runner.os,
        status: runner.status,
        busy: runner.busy,
        labels: runner.labels.map((label) => label.name),
      })),
      total: runners.length,
    });
  };

  const remove: RouteHandler = async (req, res) => {
    const { owner, repo, runnerId } = runnerParamsSchema.parse(req.params);
    const credential = await deps.credentials.resolve(owner, req);
    const removed = await deps.github.removeRunner(req, credential.token, { owner, name: repo }, runnerId);
    if (!removed) {
      throw new AppError(400, 'Failed to remove runner');
    }
    logger.info(req, 'Runner removed', { owner, repo, runnerId });
    res.status(200).json({ message: 'Runner removed successfully' });
  };

  return { registrationToken, removalToken, list, remove };
};
