import { z } from 'zod';
import {
  docRef,
  FieldValue,
  type DocumentRef,
  type DocumentSnapshot,
  type DocumentStore,
  type TransactionContext,
} from './document-store';
import { STAFF_COLLECTION, StaffRole, type Staff } from '../types/staff.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

const staffDocumentSchema = z.object({
  fullName: z.string(),
  jobCode: z.string(),
  role: z.nativeEnum(StaffRole).default(StaffRole.STAFF),
  isActive: z.boolean().default(true),
  assignedItemIds: z.array(z.string()).default([]),
  updatedAt: z
    .string()
    .datetime({ offset: true })
    .nullable()
    .default(null)
    .transform((value) => (value ? new Date(value) : null)),
});

/**
 * Staff Repository
 *
 * Handles staff documents, including the assignment list the transaction
 * engine mutates alongside an item
 */
export class StaffRepository {
  constructor(private store: DocumentStore) {}

  ref(uid: string): DocumentRef {
    return docRef(STAFF_COLLECTION, uid);
  }

  async findById(uid: string): Promise<Staff | null> {
    const snapshot = await this.store.get(this.ref(uid));
    return snapshot ? this.toStaff(snapshot) : null;
  }

  /**
   * Find by uid, falling back to job code
   */
  async resolve(reference: string): Promise<Staff | null> {
    const byId = await this.findById(reference);
    if (byId) return byId;

    const [byJobCode] = await this.store.findByField(STAFF_COLLECTION, 'jobCode', reference);
    return byJobCode ? this.toStaff(byJobCode) : null;
  }

  async getInTransaction(txn: TransactionContext, uid: string): Promise<Staff | null> {
    const snapshot = await txn.get(this.ref(uid));
    return snapshot ? this.toStaff(snapshot) : null;
  }

  /**
   * Stage the staff member's assignment list inside a transaction
   */
  setAssignedItems(txn: TransactionContext, staff: Staff, assignedItemIds: string[]): void {
    txn.update(this.ref(staff.uid), {
      assignedItemIds,
      updatedAt: FieldValue.serverTimestamp(),
    });
  }

  async save(staff: Staff): Promise<void> {
    await this.store.set(this.ref(staff.uid), {
      fullName: staff.fullName,
      jobCode: staff.jobCode,
      role: staff.role,
      isActive: staff.isActive,
      assignedItemIds: staff.assignedItemIds,
      updatedAt: FieldValue.serverTimestamp(),
    });
  }

  private toStaff(snapshot: DocumentSnapshot): Staff {
    const parsed = staffDocumentSchema.safeParse(snapshot.data);

    if (!parsed.success) {
      logger.error('Malformed staff document', { uid: snapshot.ref.id, issues: parsed.error.issues });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Staff document ${snapshot.ref.id} is malformed`, 500);
    }

    return { uid: snapshot.ref.id, ...parsed.data };
  }
}
