/**
 * Portal invoice download
 *
 * Lists the orders in range and stores each order's invoice. A failing order
 * is screenshotted, logged and skipped; a failure to list orders fails the cell.
 */

import * as fs from 'fs/promises';
import { FileRecord } from '../../types';
import { formatTimestamp } from '../../utils/dateUtils';
import { toErrorMessage } from '../../utils/errors';
import { AppLogger } from '../../utils/logger';
import { OrderSummary } from '../../vendors/types';
import { AuthenticatedSession } from '../session/PortalSessionManager';
import { FileOrganizer } from '../storage/FileOrganizer';

export interface PortalDownloadResult {
  files: FileRecord[];
  /** Orders whose invoice could not be retrieved */
  failures: number;
}

export class InvoiceDownloader {
  private readonly organizer: FileOrganizer;

  constructor(organizer: FileOrganizer) {
    this.organizer = organizer;
  }

  async downloadInvoices(
    session: AuthenticatedSession,
    since: Date,
    until: Date = new Date()
  ): Promise<PortalDownloadResult> {
    const { vendor, page, company } = session;
    const tag = `[${vendor.portalName}:${company.name}]`;

    let orders: OrderSummary[];
    try {
      orders = await vendor.listOrders(page, since, until);
    } catch (error) {
      AppLogger.error(`${tag} Could not read the order list: ${toErrorMessage(error)}`);
      await this.captureScreenshot(session, 'orders');
      throw error;
    }
    AppLogger.info(`${tag} ${orders.length} order(s) between ${since.toDateString()} and ${until.toDateString()}`);

    const files: FileRecord[] = [];
    let failures = 0;

    for (const order of orders) {
      try {
        const invoice = await vendor.fetchInvoice(page, order);
        files.push(
          await this.organizer.store(company.name, session.portal, invoice.filename, invoice.data, order.orderDate)
        );
      } catch (error) {
        failures++;
        AppLogger.warn(`${tag} Order ${order.orderId} skipped: ${toErrorMessage(error)}`);
        await this.captureScreenshot(session, `order_${order.orderId}`);
      }
    }

    return { files, failures };
  }

  private async captureScreenshot(session: AuthenticatedSession, label: string): Promise<void> {
    const fileName = `${session.portal}_${label}_${formatTimestamp(new Date())}.png`;
    try {
      const target = await this.organizer.diagnosticsPath(session.company.name, fileName);
      const image = await session.page.screenshot({ fullPage: true });
      await fs.writeFile(target, image);
      AppLogger.info(`Screenshot saved: ${target}`);
    } catch (error) {
      AppLogger.warn(`Could not save screenshot ${fileName}: ${toErrorMessage(error)}`);
    }
  }
}
