/**
 * Vendor Registry
 * Maps each portal to the factory building its automation
 */
import { Portal } from '../types';
import { ConfigurationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { PortalAutomation, VendorOptions } from './types';

export type VendorFactory = (options: VendorOptions) => PortalAutomation;

/**
 * Registry for portal automation implementations
 */
class VendorRegistry {
  private factories: Map<Portal, VendorFactory> = new Map();

  /**
   * Register a portal implementation
   */
  register(portal: Portal, factory: VendorFactory): void {
    AppLogger.debug(`[VendorRegistry] Registering vendor: ${portal}`);
    this.factories.set(portal, factory);
  }

  /**
   * Build the automation for a portal
   * @throws ConfigurationError when no implementation is registered
   */
  create(portal: Portal, options: VendorOptions = {}): PortalAutomation {
    const factory = this.factories.get(portal);
    if (!factory) {
      throw new ConfigurationError(`No automation registered for portal: ${portal}`);
    }
    return factory(options);
  }
}

// Singleton instance
const registry = new VendorRegistry();

/**
 * Register a portal implementation
 */
export function registerVendor(portal: Portal, factory: VendorFactory): void {
  registry.register(portal, factory);
}

/**
 * Build the automation for a portal
 */
export function createVendor(portal: Portal, options: VendorOptions = {}): PortalAutomation {
  return registry.create(portal, options);
}
