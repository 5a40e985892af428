import { ForbiddenError } from './errors.js';
import type { UserIdentity } from './user.js';

export type Action = 'read' | 'update' | 'delete';

/**
 * Anything with an owner: posts and comments.
 */
export interface OwnedResource {
  readonly id: string;
  readonly ownerId: string;
}

/**
 * Ownership check guarding post and comment mutation.
 *
 * Reads are open to every authenticated identity. Updates belong to the owner only;
 * deletes to the owner or an admin.
 */
export function authorize(
  identity: UserIdentity,
  resource: OwnedResource,
  action: Action
): void {
  if (action === 'read') {
    return;
  }

  if (resource.ownerId === identity.id) {
    return;
  }

  if (action === 'delete' && identity.role === 'admin') {
    return;
  }

  throw new ForbiddenError(`Not allowed to ${action} this resource`);
}
