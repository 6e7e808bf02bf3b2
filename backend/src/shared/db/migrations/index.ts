/**
 * src/shared/db/migrations/index.ts
 *
 * Static registry: keys sort in execution order. Add new files here.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_events';
import * as m0003 from './0003_invitations';

export const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_events': m0002,
  '0003_invitations': m0003,
};
