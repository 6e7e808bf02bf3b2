/**
 * backend/src/modules/invitations/index.ts
 *
 * Public surface of the invitations module.
 */

export type {
  Invitation,
  InvitationStatus,
  InvitationResponse,
  NewInvitation,
} from './invitation.types';
export type { InvitationStore } from './invitation.store';
export { KyselyInvitationStore } from './dal/kysely-invitation.store';
export { InMemInvitationStore } from './dal/inmem-invitation.store';
export { InvitationErrors } from './invitation.errors';
export { IssueInvitationService } from './services/issue-invitation.service';
export { AcceptInvitationService } from './services/accept-invitation.service';
export { DeclineInvitationService } from './services/decline-invitation.service';
export { ListMyInvitationsService } from './services/list-my-invitations.service';
export { createInvitationModule, type InvitationModule } from './invitation.module';
