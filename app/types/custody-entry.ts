/**
 * Chain of custody entry
 *
 * One immutable line in a transcript's audit trail. Entries are append-only
 * and ordered by timestamp, then by insertion order.
 */

export const CUSTODY_ACTIONS = [
  'imported',
  'exported',
  'hashed',
  'published',
  'backed-up',
  'verified',
  'modified',
] as const;

export type CustodyAction = (typeof CUSTODY_ACTIONS)[number];

export const CUSTODY_ACTION_LABELS: Record<CustodyAction, string> = {
  imported: 'Imported',
  exported: 'Exported',
  hashed: 'Hashed',
  published: 'Published',
  'backed-up': 'Backed Up',
  verified: 'Verified',
  modified: 'Modified',
};

export const VERIFICATION_STATUSES = ['verified', 'unverified', 'tampered'] as const;

/**
 * `tampered` is reserved for manual flagging; nothing assigns it yet.
 */
export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export interface CustodyEntry {
  id: string;
  transcriptId: string;
  timestamp: string;
  action: CustodyAction;
  details: string;
  fileHash: string;
  storageLocation: string | null;
  verificationStatus: VerificationStatus;
}

export interface AppendCustodyEntryInput {
  transcriptId: string;
  action: CustodyAction;
  details: string;
  fileHash: string;
  storageLocation?: string | null;
  verificationStatus: VerificationStatus;
}

export interface VerificationResult {
  isValid: boolean;
  storedHash: string;
  computedHash: string;
  verifiedAt: string;
}
