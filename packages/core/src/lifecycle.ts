/**
 * Anything the runtime owns for the lifetime of the process: stores, collaborator
 * clients, loggers that buffer. Both hooks are optional so plain objects qualify.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
