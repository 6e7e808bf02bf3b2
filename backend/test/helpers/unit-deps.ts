import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { logger } from '../../src/shared/logger/logger';
import { InMemUserStore } from '../../src/modules/users/dal/inmem-user.store';
import { InMemEventStore } from '../../src/modules/events/dal/inmem-event.store';
import { InMemInvitationStore } from '../../src/modules/invitations/dal/inmem-invitation.store';
import { fakePasswordHasher, seedMember } from './fixtures';
import type { UserRole } from '../../src/modules/users/user.types';

/**
 * Fresh in-memory collaborators for service-level tests.
 */
export function makeUnitDeps() {
  const userStore = new InMemUserStore();

  return {
    userStore,
    eventStore: new InMemEventStore(),
    invitationStore: new InMemInvitationStore(),
    queue: new InMemQueue(),
    logger,

    member(role: UserRole, email?: string) {
      return seedMember({ userStore, passwordHasher: fakePasswordHasher, role, email });
    },
  };
}
