/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module (family members).
 * - Role is the privilege checked by services: only PARENT may create events.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - User never carries the password hash; credentials are a separate shape.
 */

export type UserId = string;

export const USER_ROLES = ['PARENT', 'CHILD'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type User = {
  id: UserId;
  email: string;
  name: string;
  role: UserRole;

  createdAt: Date;
  updatedAt: Date;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export type NewUser = {
  email: string;
  name: string;
  role: UserRole;
  passwordHash: string;
};
