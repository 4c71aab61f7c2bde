/**
 * Hash publication - proof-of-existence submission of a transcript hash
 *
 * Status is fixed when the publication is created; pending submissions are
 * never polled for confirmation.
 */

export const PUBLICATION_SERVICES = [
  'github-gist',
  'email',
  'open-timestamps',
  'bitcoin-op-return',
  'custom-webhook',
] as const;

export type PublicationService = (typeof PUBLICATION_SERVICES)[number];

export const PUBLICATION_SERVICE_LABELS: Record<PublicationService, string> = {
  'github-gist': 'GitHub Gist',
  email: 'Email',
  'open-timestamps': 'OpenTimestamps',
  'bitcoin-op-return': 'Bitcoin OP_RETURN',
  'custom-webhook': 'Custom Webhook',
};

export const CONFIRMATION_STATUSES = ['pending', 'confirmed', 'failed'] as const;

export type ConfirmationStatus = (typeof CONFIRMATION_STATUSES)[number];

export interface HashPublication {
  id: string;
  transcriptId: string;
  service: PublicationService;
  publishedAt: string;
  publicUrl: string | null;

  /** Service receipt, e.g. a base64 OpenTimestamps proof */
  transactionId: string | null;

  confirmationStatus: ConfirmationStatus;
  errorMessage: string | null;
}

/**
 * What the publication client returns: the caller binds it to a transcript.
 */
export type PublicationDraft = Omit<HashPublication, 'transcriptId'>;

/**
 * Services the client can actually submit to, with their credentials.
 */
export type PublicationCredentials =
  | { service: 'github-gist'; token: string }
  | { service: 'open-timestamps' }
  | { service: 'custom-webhook'; url: string };
