export { MappingRegistry } from './mappingRegistry.js';
