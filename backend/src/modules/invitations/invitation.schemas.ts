/**
 * src/modules/invitations/invitation.schemas.ts
 *
 * RULES:
 * - Unknown keys are stripped (zod default).
 * - Email lower-cased here so lookups match the stored form.
 */

import { z } from 'zod';

export const issueInvitationSchema = z.object({
  email: z
    .string()
    .trim()
    .email('Invalid email address')
    .transform((value) => value.toLowerCase()),
});

export type IssueInvitationInput = z.infer<typeof issueInvitationSchema>;

export const invitationParamsSchema = z.object({
  invitationId: z.string().uuid('Invalid invitation id'),
});
