export const ATTACHMENT_READY = 'ATTACHMENT_READY' as const;
export const ATTACHMENT_QUARANTINED = 'ATTACHMENT_QUARANTINED' as const;

export interface AttachmentReadyPayload {
  attachmentId: string;
  userId: string;
  filename: string;
  contentType: string;
  fileSize: number;
}

export interface AttachmentQuarantinedPayload {
  attachmentId: string;
  userId: string;
  reason: string;
}
