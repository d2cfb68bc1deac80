export type Visitor = {
  id: string;
  name: string;
  encryptedPhone: string;
  encryptedPurpose: string;
  credentialId: string;
  registeredAt: Date;
  checkedOutAt: Date | null;
};

export type CheckoutOutcome =
  | { result: 'CHECKED_OUT'; visitor: Visitor }
  | { result: 'NOT_FOUND' }
  | { result: 'ALREADY_CHECKED_OUT'; visitor: Visitor };

export interface VisitorStore {
  create(visitor: Omit<Visitor, 'id' | 'checkedOutAt'>): Promise<Visitor>;
  get(id: string): Promise<Visitor | null>;
  /** Newest first. */
  list(limit: number): Promise<Visitor[]>;
  checkout(id: string, now: Date): Promise<CheckoutOutcome>;
}
