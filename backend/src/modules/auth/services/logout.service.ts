/**
 * backend/src/modules/auth/services/logout.service.ts
 *
 * Destroys the caller's session. Idempotent.
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Logger } from '../../../shared/logger/logger';
import type { SessionStore } from '../../../shared/session/session.store';

export type LogoutDeps = {
  sessionStore: SessionStore;
  logger: Logger;
};

export type LogoutInputs = {
  sessionId: string;
  userId: string;
  requestId: string | null;
};

export class LogoutService extends ApplicationService<LogoutDeps, LogoutInputs, void> {
  async call(): Promise<void> {
    await this.deps.sessionStore.destroy(this.inputs.sessionId);

    this.deps.logger.info('auth.logout.success', {
      flow: 'auth.logout',
      requestId: this.inputs.requestId,
      userId: this.inputs.userId,
    });
  }
}
