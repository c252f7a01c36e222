/**
 * Staff domain types
 */

export enum StaffRole {
  ADMIN = 'admin',
  SUPERVISOR = 'supervisor',
  STAFF = 'staff',
}

export interface Staff {
  uid: string;
  fullName: string;
  jobCode: string;
  role: StaffRole;
  isActive: boolean;
  assignedItemIds: string[];
  updatedAt: Date | null;
}

export const STAFF_COLLECTION = 'staff';
