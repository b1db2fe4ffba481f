/**
 * Vendor module exports
 */

// Types
export * from './types';

// Base class
export { BaseVendor } from './BaseVendor';

// Registry
export { registerVendor, createVendor } from './VendorRegistry';

// Vendor implementations
export { WalmartVendor } from './WalmartVendor';
export { AmazonVendor } from './AmazonVendor';

// Register vendors on module load
import { WalmartVendor } from './WalmartVendor';
import { AmazonVendor } from './AmazonVendor';
import { registerVendor } from './VendorRegistry';

registerVendor('walmart', options => new WalmartVendor(options));
registerVendor('amazon', options => new AmazonVendor(options));
