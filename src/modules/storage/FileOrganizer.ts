/**
 * Files downloaded documents into downloads/<company>/<YYYY-MM>/
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Channel, FileRecord } from '../../types';
import { formatYearMonth } from '../../utils/dateUtils';
import { AppLogger } from '../../utils/logger';
import { inspectPdf } from '../../utils/pdfUtils';
import { FileNamingService } from '../naming/FileNamingService';

const DIAGNOSTICS_DIR = 'diagnostics';

export class FileOrganizer {
  private readonly baseDir: string;
  private readonly naming: FileNamingService;

  constructor(baseDir: string, naming: FileNamingService = new FileNamingService()) {
    this.baseDir = baseDir;
    this.naming = naming;
  }

  /**
   * SHA-256 of the content, hex encoded
   */
  static fingerprint(data: Buffer): string {
    return createHash('sha256').update(data).digest('hex');
  }

  companyDirectory(company: string): string {
    return path.join(this.baseDir, this.naming.sanitizeSegment(company));
  }

  monthDirectory(company: string, date: Date): string {
    return path.join(this.companyDirectory(company), formatYearMonth(date));
  }

  /**
   * Path for a diagnostic artifact (screenshots), creating its directory
   */
  async diagnosticsPath(company: string, fileName: string): Promise<string> {
    const dir = path.join(this.companyDirectory(company), DIAGNOSTICS_DIR);
    await fs.mkdir(dir, { recursive: true });
    return path.join(dir, this.naming.sanitizeSegment(fileName));
  }

  /**
   * Store a document
   * - Identical content already in the month directory: nothing is written
   * - Name taken by different content: -2, -3, ... suffix
   */
  async store(
    company: string,
    channel: Channel,
    fileName: string,
    data: Buffer,
    date: Date = new Date()
  ): Promise<FileRecord> {
    const dir = this.monthDirectory(company, date);
    await fs.mkdir(dir, { recursive: true });

    const fingerprint = FileOrganizer.fingerprint(data);
    const existing = await this.findByFingerprint(dir, fingerprint, data.length);
    if (existing) {
      AppLogger.info(`Skipped duplicate: ${existing}`);
      return { path: existing, fingerprint, status: 'duplicate' };
    }

    const baseName = this.naming.buildFileName(channel, fileName);
    let candidate = baseName;
    let counter = 2;
    while (await this.exists(path.join(dir, candidate))) {
      candidate = this.naming.withCounter(baseName, counter);
      counter++;
    }

    const target = path.join(dir, candidate);
    await this.writeAtomic(target, data);
    this.checkPdf(target, data);

    const status = candidate === baseName ? 'written' : 'renamed';
    AppLogger.info(`Saved ${status === 'renamed' ? '(renamed) ' : ''}${target}`);
    return { path: target, fingerprint, status };
  }

  private async findByFingerprint(dir: string, fingerprint: string, size: number): Promise<string | null> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isFile() || this.isTempFile(entry.name)) {
        continue;
      }
      const filePath = path.join(dir, entry.name);
      const stat = await fs.stat(filePath);
      if (stat.size !== size) {
        continue;
      }
      const content = await fs.readFile(filePath);
      if (FileOrganizer.fingerprint(content) === fingerprint) {
        return filePath;
      }
    }

    return null;
  }

  /** In-flight writes are named .<target>.<pid>.tmp; stored names never start with a dot */
  private isTempFile(name: string): boolean {
    return name.startsWith('.') && name.endsWith('.tmp');
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async writeAtomic(target: string, data: Buffer): Promise<void> {
    const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
    try {
      await fs.writeFile(tmp, data);
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }

  private checkPdf(target: string, data: Buffer): void {
    if (path.extname(target).toLowerCase() !== '.pdf') {
      return;
    }
    const inspection = inspectPdf(data);
    if (inspection.suspicious) {
      AppLogger.warn(`PDF looks invalid (${inspection.reason}): ${target}`);
    }
  }
}
