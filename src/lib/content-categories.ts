/**
 * The seven content categories copied between distribution points, each
 * bound to a source distribution point and an AdminService client.
 */

import type { SyncCategory, SyncItem } from './sync-types.js';
import { SyncPreconditionError } from './sync-errors.js';

/**
 * Content object types as reported by SMS_DPContentInfo.ObjectType
 */
export const CONTENT_CATEGORY_DEFINITIONS = [
  { name: 'Applications', objectType: 8 },
  { name: 'Packages', objectType: 0 },
  { name: 'Boot Images', objectType: 258 },
  { name: 'Operating System Images', objectType: 257 },
  { name: 'Operating System Upgrade Packages', objectType: 259 },
  { name: 'Driver Packages', objectType: 3 },
  { name: 'Software Update Packages', objectType: 5 },
] as const;

export interface ContentCategoryDefinition {
  name: string;
  objectType: number;
}

/**
 * The part of AdminServiceClient the categories call into
 */
export interface ContentProvider {
  getDistributedContent(nalPath: string, objectType: number): Promise<SyncItem[]>;
  distributeContent(packageId: string, targetNalPath: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Pick definitions by name (case-insensitive), keeping table order.
 * No names means every category.
 */
export function selectCategoryDefinitions(names: string[] = []): ContentCategoryDefinition[] {
  if (names.length === 0) {
    return [...CONTENT_CATEGORY_DEFINITIONS];
  }

  const wanted = new Set(names.map(name => name.trim().toLowerCase()).filter(Boolean));
  const known = new Set(CONTENT_CATEGORY_DEFINITIONS.map(def => def.name.toLowerCase()));
  const unknown = [...wanted].filter(name => !known.has(name));

  if (unknown.length > 0) {
    const available = CONTENT_CATEGORY_DEFINITIONS.map(def => def.name).join(', ');
    throw new SyncPreconditionError(`Unknown content category: ${unknown.join(', ')}. Available: ${available}`);
  }

  return CONTENT_CATEGORY_DEFINITIONS.filter(def => wanted.has(def.name.toLowerCase()));
}

export function buildContentCategories(
  provider: ContentProvider,
  sourceNalPath: string,
  definitions: ContentCategoryDefinition[] = [...CONTENT_CATEGORY_DEFINITIONS]
): SyncCategory[] {
  return definitions.map(definition => ({
    name: definition.name,
    enumerate: () => provider.getDistributedContent(sourceNalPath, definition.objectType),
    apply: (item, target, context) => provider.distributeContent(item.id, target, context.signal),
  }));
}
