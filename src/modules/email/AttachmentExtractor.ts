/**
 * Pick document attachments out of parsed messages
 */

import * as path from 'path';
import { AppLogger } from '../../utils/logger';

/**
 * The parts of a mailparser attachment this module reads
 */
export interface MailAttachment {
  filename?: string;
  contentType: string;
  content: Buffer;
  related?: boolean;
}

export interface EmailAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
  receivedAt: Date;
  messageUid: number;
}

const PDF_TYPES = [
  'application/pdf',
  'application/x-pdf',
  'application/acrobat',
  'application/vnd.pdf',
  'text/pdf',
  'text/x-pdf',
];

const EXTENSION_BY_TYPE: { [contentType: string]: string } = {
  'application/pdf': '.pdf',
  'application/msword': '.doc',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': '.docx',
  'application/vnd.ms-excel': '.xls',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': '.xlsx',
  'application/vnd.oasis.opendocument.text': '.odt',
  'application/vnd.oasis.opendocument.spreadsheet': '.ods',
  'text/csv': '.csv',
  'application/xml': '.xml',
  'text/xml': '.xml',
};

const DOCUMENT_EXTENSIONS = new Set(['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.odt', '.ods', '.csv', '.xml']);

export class AttachmentExtractor {
  /**
   * Document attachments of one message, named and dated
   */
  extractDocuments(attachments: MailAttachment[], messageUid: number, receivedAt: Date): EmailAttachment[] {
    const documents: EmailAttachment[] = [];

    attachments.forEach((attachment, index) => {
      const name = attachment.filename ?? '';
      const contentType = attachment.contentType.toLowerCase();

      AppLogger.debug(`[Email] Message ${messageUid} attachment ${index}: name="${name}", contentType="${contentType}"`);

      if (attachment.related) {
        return;
      }
      if (!this.isDocumentContentType(contentType) && !this.isDocumentFilename(name)) {
        return;
      }

      documents.push({
        filename: name || this.deriveFilename(messageUid, index, contentType),
        contentType,
        content: attachment.content,
        receivedAt,
        messageUid,
      });
    });

    return documents;
  }

  /**
   * Handles the MIME aliases mail clients use for PDFs
   */
  isDocumentContentType(contentType: string): boolean {
    const lower = contentType.toLowerCase();
    if (PDF_TYPES.some(type => lower.includes(type))) {
      return true;
    }
    const base = lower.split(';')[0].trim();
    return base in EXTENSION_BY_TYPE;
  }

  isDocumentFilename(filename: string): boolean {
    return DOCUMENT_EXTENSIONS.has(path.extname(filename).toLowerCase());
  }

  private deriveFilename(messageUid: number, index: number, contentType: string): string {
    const base = contentType.split(';')[0].trim();
    const isPdf = PDF_TYPES.some(type => base.includes(type));
    const ext = isPdf ? '.pdf' : EXTENSION_BY_TYPE[base] ?? '.bin';
    return `attachment-${messageUid}-${index + 1}${ext}`;
  }
}
