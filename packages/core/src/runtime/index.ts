/**
 * Runtime
 * Executables, execution contexts and the services programs see
 */

export {
  DEFAULT_EXPOSED_NAME,
  Executable,
  IN_FLOW_PREFIX,
} from './executable.js';
export type {
  ExecutableOptions,
  ExecutableState,
  ExecuteOptions,
} from './executable.js';
export {
  ExecutionContext,
  StringWriter,
  createStreamWriter,
} from './context.js';
export type { ExecutionContextOptions, Writer } from './context.js';
export type { ExecutionController } from './controller.js';
export { ExecutableService } from './services.js';
export type { ExecutableContainer } from './services.js';
export {
  DocumentService,
  EXECUTED_DOCUMENTS_ATTRIBUTE,
} from './document-service.js';
export type { DocumentServiceOptions } from './document-service.js';
