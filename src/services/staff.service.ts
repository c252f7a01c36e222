import { StaffRepository } from '../repositories/staff.repository';
import { ItemRepository } from '../repositories/item.repository';
import { GlobalHistoryService } from './global-history.service';
import { resolveHistoryQuery, type HistoryRangeInput } from './history-ledger';
import { ItemKind, type Tool } from '../types/item.types';
import type { Staff } from '../types/staff.types';
import type { HistoryEntry } from '../types/history.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

export interface StaffAssignments {
  staff: Staff;
  items: Tool[];
}

/**
 * Staff Service
 *
 * What a staff member holds right now (from their assignment list) and what
 * they have done (from the global ledger)
 */
export class StaffService {
  constructor(
    private staffRepo: StaffRepository,
    private itemRepo: ItemRepository,
    private globalHistory: GlobalHistoryService
  ) {}

  async getAssignedItems(reference: string): Promise<StaffAssignments> {
    const staff = await this.requireStaff(reference);

    const items = await Promise.all(
      staff.assignedItemIds.map((id) => this.itemRepo.findById(ItemKind.TOOL, id))
    );

    const tools: Tool[] = [];
    items.forEach((item, index) => {
      if (item && item.kind === ItemKind.TOOL) {
        tools.push(item);
      } else {
        logger.warn('Assigned item no longer exists', { staffUid: staff.uid, itemId: staff.assignedItemIds[index] });
      }
    });

    return { staff, items: tools };
  }

  /**
   * Entries where the staff member acted or received the item
   */
  async getHistory(reference: string, range: HistoryRangeInput): Promise<HistoryEntry[]> {
    const staff = await this.requireStaff(reference);
    return this.globalHistory.queryStaffHistory(staff.uid, resolveHistoryQuery(range));
  }

  private async requireStaff(reference: string): Promise<Staff> {
    const staff = await this.staffRepo.resolve(reference);
    if (!staff) {
      throw new AppError(ErrorCode.STAFF_NOT_FOUND, `Staff member ${reference} not found`, 404);
    }
    return staff;
  }
}
