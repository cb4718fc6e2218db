export { ToolRegistry, RegistryBuilder, RegistrationAbortedError } from './ToolRegistry.js';
export type { ToolRegistryOptions, ListToolsOptions, RejectedRegistration } from './ToolRegistry.js';
