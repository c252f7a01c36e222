import fs from 'fs';
import { z } from 'zod';
import { docRef, type DocumentStore } from './document-store';
import { ItemRepository } from './item.repository';
import { StaffRepository } from './staff.repository';
import { ITEM_COLLECTIONS, ItemKind, ToolStatus } from '../types/item.types';
import { STAFF_COLLECTION, StaffRole } from '../types/staff.types';
import { logger } from '../config/logger';

const emptyInstantStatus = {
  lastAssignedToName: null,
  lastAssignedToJobCode: null,
  lastAssignedByName: null,
  lastAssignedAt: null,
  lastCheckinAt: null,
  lastCheckinByName: null,
  updatedAt: null,
};

export const seedDataSchema = z.object({
  staff: z
    .array(
      z.object({
        uid: z.string().min(1),
        fullName: z.string().min(1),
        jobCode: z.string().min(1),
        role: z.nativeEnum(StaffRole).default(StaffRole.STAFF),
        isActive: z.boolean().default(true),
      })
    )
    .default([]),
  tools: z
    .array(
      z.object({
        id: z.string().min(1),
        uniqueId: z.string().min(1),
        name: z.string(),
        brand: z.string().default(''),
        model: z.string().default(''),
      })
    )
    .default([]),
  consumables: z
    .array(
      z.object({
        id: z.string().min(1),
        uniqueId: z.string().min(1),
        name: z.string(),
        brand: z.string().default(''),
        unit: z.string().default('pcs'),
        currentQuantity: z.number().nonnegative(),
        minQuantity: z.number().nonnegative().default(0),
      })
    )
    .default([]),
});

export type SeedData = z.input<typeof seedDataSchema>;

export interface SeedOptions {
  // Replace documents that already exist; otherwise they are left as they are
  overwrite?: boolean;
}

export interface SeedResult {
  written: number;
  skipped: number;
}

/**
 * Write staff, tools (all available) and consumables into the store
 *
 * Existing documents keep their custody state unless `overwrite` is set.
 */
export async function seedStore(store: DocumentStore, input: SeedData, options: SeedOptions = {}): Promise<SeedResult> {
  const data = seedDataSchema.parse(input);
  const itemRepo = new ItemRepository(store);
  const staffRepo = new StaffRepository(store);
  const result: SeedResult = { written: 0, skipped: 0 };

  const shouldWrite = async (collection: string, id: string): Promise<boolean> => {
    if (options.overwrite || !(await store.get(docRef(collection, id)))) {
      result.written++;
      return true;
    }
    result.skipped++;
    return false;
  };

  for (const staff of data.staff) {
    if (await shouldWrite(STAFF_COLLECTION, staff.uid)) {
      await staffRepo.save({ ...staff, assignedItemIds: [], updatedAt: null });
    }
  }

  for (const tool of data.tools) {
    if (await shouldWrite(ITEM_COLLECTIONS[ItemKind.TOOL], tool.id)) {
      await itemRepo.save({
        ...tool,
        ...emptyInstantStatus,
        kind: ItemKind.TOOL,
        status: ToolStatus.AVAILABLE,
        currentHolderUid: null,
      });
    }
  }

  for (const consumable of data.consumables) {
    if (await shouldWrite(ITEM_COLLECTIONS[ItemKind.CONSUMABLE], consumable.id)) {
      await itemRepo.save({ ...consumable, ...emptyInstantStatus, kind: ItemKind.CONSUMABLE });
    }
  }

  logger.info('Store seeded', { ...result, overwrite: options.overwrite ?? false });
  return result;
}

export async function seedStoreFromFile(
  store: DocumentStore,
  file: string,
  options: SeedOptions = {}
): Promise<SeedResult> {
  const raw: unknown = JSON.parse(await fs.promises.readFile(file, 'utf8'));
  return seedStore(store, seedDataSchema.parse(raw), options);
}
