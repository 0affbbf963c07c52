import type { Credential } from '../credentials/resolver';
import { ProvisioningError, errorMessage } from '../errors';
import type { RepositoryCoordinates } from '../github/types';
import { logger, LogContext } from '../logger';
import type { TaskHandle, TaskLauncher } from './ecs';

// Built per accepted admission; dropped after hand-off
export interface ProvisionRequest {
  eventType: string;
  action: string | null;
  target: RepositoryCoordinates;
  credential: Credential;
  trigger: string;
}

export type LaunchResult = { ok: true; task: TaskHandle } | { ok: false; error: ProvisioningError };

// Launch failures are logged and returned, never thrown: the webhook was processed either way
export class Provisioner {
  constructor(private readonly launcher: TaskLauncher) {}

  async launch(request: ProvisionRequest, ctx?: LogContext): Promise<LaunchResult> {
    try {
      const task = await this.launcher.launch(
        { target: request.target, token: request.credential.token, trigger: request.trigger },
        ctx
      );
      return { ok: true, task };
    } catch (error: unknown) {
      const failure = error instanceof ProvisioningError ? error : new ProvisioningError(errorMessage(error), error);
      logger.error(ctx, 'Runner task creation failed', {
        owner: request.target.owner,
        repo: request.target.name,
        trigger: request.trigger,
        error: failure.message,
      });
      return { ok: false, error: failure };
    }
  }
}
