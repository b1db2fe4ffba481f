/**
 * File naming service
 */

import * as path from 'path';
import { Channel } from '../../types';

const MAX_NAME_LENGTH = 150;

export class FileNamingService {
  /**
   * Make a single path segment safe for the filesystem
   * - Replace invalid characters \/:*?"<>| and control characters with '_'
   * - Drop leading dots so nothing ends up hidden
   * - Cut long names, keeping the extension
   */
  sanitizeSegment(name: string): string {
    let normalized = name
      .replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_')
      .replace(/\s+/g, ' ')
      .trim()
      .replace(/^\.+/, '');

    if (normalized.length > MAX_NAME_LENGTH) {
      const ext = path.extname(normalized);
      const keep = ext.length < 16 ? ext : '';
      normalized = normalized.substring(0, MAX_NAME_LENGTH - keep.length) + keep;
    }

    return normalized || 'unnamed';
  }

  /**
   * Destination file name: <channel>_<name>
   * A name already carrying the channel prefix is not prefixed twice.
   */
  buildFileName(channel: Channel, originalName: string): string {
    const sanitized = this.sanitizeSegment(originalName);
    const prefix = `${channel}_`;
    return sanitized.toLowerCase().startsWith(prefix) ? sanitized : `${prefix}${sanitized}`;
  }

  /**
   * Next candidate for a taken name: invoice.pdf -> invoice-2.pdf -> invoice-3.pdf
   */
  withCounter(fileName: string, counter: number): string {
    const ext = path.extname(fileName);
    const base = fileName.slice(0, fileName.length - ext.length);
    return `${base}-${counter}${ext}`;
  }
}
