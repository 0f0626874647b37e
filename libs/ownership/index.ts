export { OwnershipRegistry } from './ownershipRegistry.js';
