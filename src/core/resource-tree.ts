/**
 * Resource hierarchy
 * Block/Task -> Note -> Notebook. User resources are roots.
 */

import type { ResourceKind } from './types.js';

export interface ResourceRef {
  kind: ResourceKind;
  id: string;
}

/**
 * Parentage and ownership lookups the access walk needs from the store.
 * A missing resource resolves to null.
 */
export interface ResourceGraph {
  parentOf(ref: ResourceRef): Promise<ResourceRef | null>;
  ownerOf(ref: ResourceRef): Promise<string | null>;
}

export interface ResourceNode {
  parent: ResourceKind | null;
  /** Whether the resource's user_id grants unconditional access */
  ownershipGrants: boolean;
}

export const RESOURCE_TREE: Readonly<Record<ResourceKind, ResourceNode>> = {
  block: { parent: 'note', ownershipGrants: false },
  task: { parent: 'note', ownershipGrants: false },
  note: { parent: 'notebook', ownershipGrants: true },
  notebook: { parent: null, ownershipGrants: false },
  user: { parent: null, ownershipGrants: false }
};

export const MAX_TREE_DEPTH = 4;

export function formatRef(ref: ResourceRef): string {
  return `${ref.kind}:${ref.id}`;
}
