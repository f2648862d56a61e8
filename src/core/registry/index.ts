export { ApplicationRegistry } from './application-registry.js';
export { configFilePath, defineApplication, serviceAddress, serviceName } from './define.js';
